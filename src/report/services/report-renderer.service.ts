import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as handlebars from 'handlebars';
import * as path from 'path';
import { ReportError } from '../../common/errors/report.errors';

export interface RenderOptions {
  templatesDir: string;
}

/**
 * Turns a template name and a context into HTML. Templates are `<name>.hbs`
 * files under `templatesDir`, passed in on every call.
 */
@Injectable()
export class ReportRendererService {
  private readonly logger = new Logger(ReportRendererService.name);
  // Own environment so helpers never leak into the global Handlebars instance
  private readonly engine = handlebars.create();
  private readonly templates = new Map<string, handlebars.TemplateDelegate>();

  constructor() {
    this.engine.registerHelper('inc', (value: number) => value + 1);
    this.engine.registerHelper('percent', (value: number) => value.toFixed(2));
    this.engine.registerHelper('number', (value: number) => value.toLocaleString('en-US'));
    this.engine.registerHelper('join', (values: unknown) =>
      Array.isArray(values) ? values.join(', ') : '',
    );
  }

  async render(templateName: string, context: object, options: RenderOptions): Promise<string> {
    const template = await this.compileTemplate(
      path.join(options.templatesDir, `${templateName}.hbs`),
    );
    return template(context);
  }

  private async compileTemplate(templatePath: string): Promise<handlebars.TemplateDelegate> {
    const cached = this.templates.get(templatePath);
    if (cached) return cached;

    try {
      const source = await fs.readFile(templatePath, 'utf8');
      const template = this.engine.compile(source);
      this.templates.set(templatePath, template);
      return template;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not find or compile template: ${templatePath}`);
      throw new ReportError(`Could not load template ${templatePath}: ${reason}`, 'render');
    }
  }
}
