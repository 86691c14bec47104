/**
 * Actor Prompt Types
 *
 * An ActorPrompt is the instruction text handed to the downstream generator
 * for one turn, plus a structured trace of how it was built.
 */

/** Literal section headers, in the order they are written */
export const PROMPT_SECTION_HEADERS = [
  '[Role Definition]',
  '[Current Situation]',
  '[Strategy & Task]',
  '[Constraints]',
] as const;

export type PromptSectionHeader = (typeof PROMPT_SECTION_HEADERS)[number];

export interface PromptSection {
  header: PromptSectionHeader;
  body: string;
}

export interface ActorPromptDebug {
  sessionId: string;
  turnId: string;
  role: string;
  beat: string;
  outputAction: string;
  talkBurstLimitSec: number;
  userMindState: string[];
  /** True when the deterministic fallback prompt was used */
  fallback: boolean;
  fallbackReason?: string;
}

export interface ActorPrompt {
  /** The full instruction text */
  instructions: string;
  sections: PromptSection[];
  debug: ActorPromptDebug;
}

/**
 * Session context the Actor needs besides the plan.
 */
export interface ActorContext {
  sessionId: string;
  turnId: string;
  entryId: string;
  domain: string;
  mainObjective: string;
  /** Substituted for {concept} in beat templates */
  conceptName: string;
  /** Substituted for {metaphor} in beat templates */
  metaphor: string;
  lastUserText: string;
}
