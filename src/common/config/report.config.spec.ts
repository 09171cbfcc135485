import { ReportError } from '../errors/report.errors';
import reportConfig, {
  DEFAULT_TEMPLATES_DIR,
  splitList,
  validateReportEnvironment,
  ZeroFollowerPolicy,
} from './report.config';

describe('report config', () => {
  describe('validateReportEnvironment', () => {
    it('accepts an environment without report keys', () => {
      const env = { PATH: '/usr/bin' };
      expect(validateReportEnvironment(env)).toBe(env);
    });

    it('rejects a malformed date', () => {
      expect(() => validateReportEnvironment({ REPORT_START_DATE: '2021/01/01' })).toThrow(
        'Invalid configuration: REPORT_START_DATE must be a YYYY-MM-DD date',
      );
    });

    it('rejects an unknown zero follower policy', () => {
      expect(() =>
        validateReportEnvironment({ REPORT_ZERO_FOLLOWER_POLICY: 'ignore' }),
      ).toThrow(ReportError);
    });

    it('rejects an empty mention literal', () => {
      expect(() => validateReportEnvironment({ REPORT_MENTION: '' })).toThrow(
        /REPORT_MENTION/,
      );
    });
  });

  describe('splitList', () => {
    it('trims items and drops empty ones', () => {
      expect(splitList(' @brand, #brand ,,')).toEqual(['@brand', '#brand']);
      expect(splitList('')).toEqual([]);
    });
  });

  describe('report namespace', () => {
    const keys = [
      'REPORT_BRAND_TAGS',
      'REPORT_ZERO_FOLLOWER_POLICY',
      'REPORT_START_DATE',
      'REPORT_TITLE',
    ];
    const saved = new Map(keys.map((key) => [key, process.env[key]]));

    afterEach(() => {
      for (const [key, value] of saved) {
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
    });

    it('falls back to the defaults', () => {
      keys.forEach((key) => delete process.env[key]);

      const config = reportConfig();

      expect(config.brandTags).toEqual(['@bubbleroom', '#bubbleroom', '#bubbleroomstyle']);
      expect(config.startDate).toBe('2021-01-01');
      expect(config.zeroFollowerPolicy).toBe(ZeroFollowerPolicy.Error);
      expect(config.title).toBe('Brand Engagement Report');
      expect(config.templatesDir).toBe(DEFAULT_TEMPLATES_DIR);
    });

    it('reads overrides from the environment', () => {
      process.env.REPORT_BRAND_TAGS = '@acme,#acme';
      process.env.REPORT_ZERO_FOLLOWER_POLICY = 'skip';
      process.env.REPORT_START_DATE = '2022-05-01';

      const config = reportConfig();

      expect(config.brandTags).toEqual(['@acme', '#acme']);
      expect(config.zeroFollowerPolicy).toBe(ZeroFollowerPolicy.Skip);
      expect(config.startDate).toBe('2022-05-01');
    });
  });
});
