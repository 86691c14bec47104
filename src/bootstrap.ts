/**
 * Runtime Composition
 *
 * Wires the engine from a validated configuration: stores, catalog,
 * templates, the Director variant, the LLM client when one is needed, and
 * the Orchestrator on top. Both the HTTP server and the CLI start from here.
 *
 * @example
 * ```typescript
 * const runtime = await createRuntime(config);
 * const { sessionId } = await runtime.orchestrator.startSession('opportunity-cost');
 * ```
 */

import { requiresLLM, type Config } from '@/config';
import { InstructionAssembler, TemplateLibrary } from '@/core/actor';
import { EntryCatalog } from '@/core/catalog/entry-catalog';
import { createDirector } from '@/core/director';
import { LlmResponseGenerator, Orchestrator } from '@/core/orchestrator';
import { AnthropicClient, type LLMClient } from '@/llm';
import { createStores } from '@/storage';

export interface Runtime {
  orchestrator: Orchestrator;
  catalog: EntryCatalog;
  templates: TemplateLibrary;
}

export interface RuntimeOverrides {
  /** Replaces the Anthropic client, e.g. in tests */
  llmClient?: LLMClient;
}

/**
 * @throws {LLMError} If an LLM-backed mode is selected without an API key
 * @throws {InternalError} If the entry catalog cannot be loaded
 * @throws {TemplateLoadError} If the prompt templates cannot be loaded
 */
export async function createRuntime(cfg: Config, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const catalog = await EntryCatalog.load(cfg.storage.entriesPath);
  const templates = await TemplateLibrary.load(cfg.actor.promptsDir);
  const { timeline, sessions } = createStores(cfg);

  let llmClient = overrides.llmClient;
  if (!llmClient && requiresLLM(cfg)) {
    llmClient = new AnthropicClient({
      apiKey: cfg.anthropic.apiKey,
      model: cfg.anthropic.model,
      maxTokens: cfg.anthropic.maxTokens,
    });
  }

  const director = createDirector(cfg.director, { llmClient });
  const assembler = new InstructionAssembler(templates, {
    maxPromptLength: cfg.actor.maxPromptLength,
    defaultTalkBurstSec: cfg.director.defaultTalkBurstSec,
  });
  const generator =
    cfg.orchestrator.responseMode === 'generate' && llmClient
      ? new LlmResponseGenerator(llmClient, { maxTokens: cfg.anthropic.maxTokens })
      : undefined;

  const orchestrator = new Orchestrator(
    { sessions, timeline, director, assembler, catalog, generator },
    cfg.orchestrator
  );

  console.log(
    `[Runtime] Director: ${cfg.director.mode}, responses: ${cfg.orchestrator.responseMode}, storage: ${cfg.storage.driver}, ${catalog.list().length} entries`
  );

  return { orchestrator, catalog, templates };
}
