/**
 * Actor errors. The first three are recoverable: the assembler answers them
 * with the fallback prompt. TemplateLoadError is raised at startup only.
 */

import { InternalError, ValidationError } from '@/core/errors';

export type TemplateKind = 'role' | 'beat';

export class TemplateNotFoundError extends ValidationError {
  readonly templateKind: TemplateKind;
  readonly templateName: string;

  constructor(kind: TemplateKind, name: string) {
    super(`No ${kind} template named '${name}'`);
    this.name = 'TemplateNotFoundError';
    this.templateKind = kind;
    this.templateName = name;
  }
}

/** The plan names no beat or no output action */
export class EmptyInstructionError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInstructionError';
  }
}

/** The assembled prompt breaks the header or length invariants */
export class PromptValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'PromptValidationError';
  }
}

export class TemplateLoadError extends InternalError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'TemplateLoadError';
  }
}
