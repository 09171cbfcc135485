export type ReportStage = 'config' | 'load' | 'filter' | 'rank' | 'render';

/**
 * Base class for every failure that stops a report run.
 * `stage` names the pipeline step that failed.
 */
export class ReportError extends Error {
  constructor(
    message: string,
    public readonly stage: ReportStage,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required field is missing (after defaults were applied) or holds a value
 * of the wrong shape. The whole dataset is rejected.
 */
export class ValidationError extends ReportError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly row?: number,
  ) {
    super(message, 'load');
  }
}

/**
 * A date bound or timestamp could not be parsed.
 */
export class ParseError extends ReportError {
  constructor(
    message: string,
    public readonly value: string,
    stage: ReportStage = 'load',
  ) {
    super(message, stage);
  }
}

/**
 * An engagement ratio was requested for a user with zero followers.
 */
export class DivisionError extends ReportError {
  constructor(
    message: string,
    public readonly userId: string,
  ) {
    super(message, 'rank');
  }
}
