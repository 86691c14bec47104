/**
 * Director Plan Prompt Builder
 *
 * Builds the prompts that ask the decision provider to act as the session's
 * director, and parses its reply back into a plan.
 *
 * Key design decisions:
 *
 * 1. **Structured output**: The provider must return a single JSON object
 *    with snake_case keys. The reply is validated with zod; anything that
 *    does not match is treated as malformed and the caller falls back.
 *
 * 2. **The provider infers, the engine constrains**: flow mode, mind state
 *    and intent are the provider's own inference. Beats and roles are
 *    constrained to the configured sets, and the output-clock rule is stated
 *    explicitly; the guardrails enforce both afterwards regardless.
 *
 * 3. **Short history**: Only the last four turns are included. Older turns
 *    rarely change the next beat and make the prompt slower.
 */

import { z } from 'zod';
import { getBeatCard } from '@/core/director/beat-library';
import {
  FLOW_MODES,
  GOALS,
  INTENTS,
  STACK_ACTIONS,
  USER_MIND_STATES,
  type DirectorPlan,
  type SessionState,
} from '@/core/models';

/** How many recent turns the provider sees */
const RECENT_TURN_COUNT = 4;

/**
 * Parameters for the director user prompt.
 */
export interface DirectorPromptParams {
  state: Readonly<SessionState>;
  /** The learner text being answered (may be empty for the opening turn) */
  userInput: string;
  roles: readonly string[];
  beats: readonly string[];
  outputClockThresholdSec: number;
}

/**
 * System prompt establishing the director role and the output contract.
 */
export function buildDirectorSystemPrompt(): string {
  return `You are the director of a spoken tutoring conversation with several roles. Each turn you decide which role speaks next (the role) and which teaching strategy it plays (the beat).

## Your Responsibilities

1. **Infer the flow mode**: FLOW when the learner is following, RESCUE when something needs fixing.
2. **Infer the learner's mind state**: one or more tags.
3. **Choose the beat**: from the available beats only.
4. **Choose the role**: from the available roles only.
5. **Give a content direction**: roughly what the role should talk about this turn, based on the topic, the recent conversation and what you know about the learner.

## Key Principles

- You infer the learner's state yourself; the numbers are evidence, not conclusions.
- Hard constraints must be respected (an output clock at or above the threshold requires an output beat).
- Every choice must come from the available sets.

## Output

Respond with ONLY a valid JSON object. Never include anything outside the JSON object in your response.`;
}

/**
 * User prompt carrying the state panel, signals, latest input, recent turns,
 * the beat library, the cast and the decision rules.
 *
 * @example
 * ```typescript
 * const prompt = buildDirectorUserPrompt({
 *   state,
 *   userInput: 'why does that cost anything?',
 *   roles: ['host', 'economist', 'skeptic'],
 *   beats: config.director.availableBeats,
 *   outputClockThresholdSec: 90,
 * });
 * ```
 */
export function buildDirectorUserPrompt(params: DirectorPromptParams): string {
  const { state, roles, beats, outputClockThresholdSec } = params;
  const misconceptions =
    state.misconceptionTags.length > 0 ? state.misconceptionTags.join(', ') : '(none)';

  return `## State Panel

**Main Objective**: ${sanitizeInput(state.mainObjective)}
**Current Beat**: ${state.beat}
**Mastery Estimate**: ${state.masteryEstimate.toFixed(2)} (0-1, higher means better understanding)
**Misconception Tags**: ${misconceptions}
**Output Clock**: ${state.outputClockSec} seconds since the last assistant output (at ${outputClockThresholdSec} or more the learner must be made to produce output)
**Tension Level**: ${state.tensionLevel} (0-10)
**Cognitive Load**: ${state.cognitiveLoad} (0-10)
**Parked Branch Questions**: ${state.questionStack.length}

**Learner Signals**:
- Last output length: ${state.signals.lastUserChars} characters
- Response latency: ${state.signals.lastUserLatencyMs} ms

**Latest Learner Input**: "${sanitizeInput(params.userInput)}"

**Recent Turns**:
${formatRecentTurns(state)}

---

## Beat Library

${formatBeatCards(beats)}

## Available Roles

${roles.join(', ')}

---

## Rules

1. **flow_mode**: FLOW if the learner follows smoothly (mastery at least 0.4, no misconceptions, load not high). RESCUE otherwise.
2. **user_mind_state** (one or more of ${USER_MIND_STATES.join(', ')}):
   - Fog: misconceptions and high cognitive load
   - Illusion: low mastery while claiming to understand
   - Partial: mastery between 0.4 and 0.7
   - Aha: mastery at least 0.7 with no misconceptions
   - Verify: the learner asks a question
   - Expand: the learner brings up examples or cases
   - Fatigue: short outputs (under 10 characters) with long latency (over 5000 ms)
   - Engaged: none of the above
3. **intent**: one of ${INTENTS.join(', ')}.
4. **next_beat**:
   - If the output clock is at or above ${outputClockThresholdSec}, you MUST choose check, feynman or exit_ticket
   - If Fatigue, prefer minigame or exit_ticket
   - If FLOW, prefer continue, deepen or check
   - If RESCUE with Fog, prefer reveal or lens_shift
   - If RESCUE with Illusion, prefer twist or check
5. **next_role**: one of the available roles, matched to the beat and the learner's state.
6. **tension_goal** and **load_goal**: increase below 4, decrease above 7, maintain otherwise.
7. **stack_action**: push when the learner raises a side question worth parking, pop when they are ready to return to a parked one, keep otherwise.

## Response Format

\`\`\`json
{
  "flow_mode": "FLOW" | "RESCUE",
  "user_mind_state": ["..."],
  "intent": "string",
  "next_beat": "string",
  "next_role": "string",
  "output_action": "string",
  "content_direction": "string",
  "talk_burst_limit_sec": number,
  "tension_goal": "increase" | "maintain" | "decrease",
  "load_goal": "increase" | "maintain" | "decrease",
  "stack_action": "push" | "pop" | "keep",
  "notes": "string"
}
\`\`\`

**Important:** Return ONLY the JSON object.`;
}

function formatRecentTurns(state: Readonly<SessionState>): string {
  if (state.turns.length === 0) {
    return '(no previous turns)';
  }
  return state.turns
    .slice(-RECENT_TURN_COUNT)
    .map((turn) => `  [${turn.role}]: ${sanitizeInput(turn.text)}`)
    .join('\n');
}

function formatBeatCards(beats: readonly string[]): string {
  return beats
    .map((beatId) => {
      const card = getBeatCard(beatId);
      return card
        ? `- **${beatId}**: ${card.goal} (learner must: ${card.userMustDoType}, length: ${card.talkBurstLimitHint}s)`
        : `- **${beatId}**`;
    })
    .join('\n');
}

/**
 * Keeps learner text from closing the JSON example or faking fences.
 */
function sanitizeInput(input: string): string {
  return input
    .trim()
    .replace(/```json/gi, '` ` `json')
    .replace(/```/g, '` ` `')
    .replace(/"/g, "'");
}

// ============================================================================
// Response parsing
// ============================================================================

const directorPlanResponseSchema = z.object({
  flow_mode: z.enum(FLOW_MODES),
  user_mind_state: z.array(z.enum(USER_MIND_STATES)).min(1),
  intent: z.enum(INTENTS),
  next_beat: z.string().min(1),
  next_role: z.string().min(1),
  output_action: z.string(),
  content_direction: z.string().default(''),
  talk_burst_limit_sec: z.number(),
  tension_goal: z.enum(GOALS),
  load_goal: z.enum(GOALS),
  stack_action: z.enum(STACK_ACTIONS).optional(),
  notes: z.string().default(''),
});

/**
 * The provider's plan before the engine adds the debug trace and the
 * learner artifact. `stackAction` is optional because providers often leave
 * it out; the caller derives it from the intent.
 */
export type ProviderPlan = Omit<DirectorPlan, 'debug' | 'userMustDo' | 'stackAction'> & {
  stackAction?: DirectorPlan['stackAction'];
};

export type DirectorPlanParseResult =
  | { ok: true; plan: ProviderPlan }
  | { ok: false; error: string };

/**
 * Parses the provider reply.
 *
 * Handles common response variations:
 * - JSON wrapped in markdown code blocks
 * - Extra text around the JSON
 *
 * @example
 * ```typescript
 * const result = parseDirectorPlanResponse(response.text);
 * if (!result.ok) {
 *   return createFallbackPlan(roles[0], 20, 'malformed_response');
 * }
 * ```
 */
export function parseDirectorPlanResponse(response: string): DirectorPlanParseResult {
  if (!response || response.trim() === '') {
    return { ok: false, error: 'Empty response' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(extractJson(response));
  } catch {
    return { ok: false, error: `Response is not JSON: ${response.substring(0, 100)}` };
  }

  const result = directorPlanResponseSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `Invalid plan: ${issues}` };
  }

  const data = result.data;
  return {
    ok: true,
    plan: {
      flowMode: data.flow_mode,
      userMindState: data.user_mind_state,
      intent: data.intent,
      nextBeat: data.next_beat,
      nextRole: data.next_role,
      outputAction: data.output_action,
      contentDirection: data.content_direction,
      talkBurstLimitSec: data.talk_burst_limit_sec,
      tensionGoal: data.tension_goal,
      loadGoal: data.load_goal,
      stackAction: data.stack_action,
      notes: data.notes,
    },
  };
}

/**
 * Pulls the JSON text out of a fenced block, or takes the first `{` to the
 * last `}`.
 */
function extractJson(response: string): string {
  const codeBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonString = codeBlockMatch ? codeBlockMatch[1].trim() : response.trim();

  if (jsonString.startsWith('{')) {
    return jsonString;
  }
  const startIdx = jsonString.indexOf('{');
  const endIdx = jsonString.lastIndexOf('}');
  if (startIdx !== -1 && endIdx > startIdx) {
    return jsonString.substring(startIdx, endIdx + 1);
  }
  return jsonString;
}
