/**
 * Rendering failures. A failed render never yields a partially substituted
 * string, so callers can rely on the thrown error alone.
 */
export class TemplateRenderError extends Error {
  readonly templateId: string;

  constructor(templateId: string, message: string) {
    super(message);
    this.name = "TemplateRenderError";
    this.templateId = templateId;
  }
}

export class MissingValueError extends TemplateRenderError {
  readonly missing: readonly string[];

  constructor(templateId: string, missing: readonly string[]) {
    super(templateId, `Template '${templateId}' is missing values for: ${missing.join(", ")}`);
    this.name = "MissingValueError";
    this.missing = missing;
  }
}

export class UnknownPlaceholderError extends TemplateRenderError {
  readonly unknown: readonly string[];

  constructor(templateId: string, unknown: readonly string[]) {
    super(templateId, `Template '${templateId}' has no placeholders named: ${unknown.join(", ")}`);
    this.name = "UnknownPlaceholderError";
    this.unknown = unknown;
  }
}
