export {
  assemble,
  buildFallbackPrompt,
  extractBeatDirective,
  extractRoleEssence,
  validateInstructions,
  InstructionAssembler,
  type AssembleOptions,
  type InstructionAssemblerOptions,
} from './actor';
export { TemplateLibrary } from './template-library';
export { parseTemplate, findSection, type ParsedTemplate, type TemplateSection } from './template-parser';
export {
  TemplateNotFoundError,
  EmptyInstructionError,
  PromptValidationError,
  TemplateLoadError,
  type TemplateKind,
} from './errors';
