/**
 * Signal Inference
 *
 * Rules that turn the snapshot and the latest learner text into the
 * Director's working vocabulary: flow mode, mind state, intent, candidate
 * beats and stack action. Keyword matching is case-insensitive substring
 * matching; it is meant to be cheap, not accurate.
 */

import type {
  FlowMode,
  Goal,
  Intent,
  SessionState,
  StackAction,
  TimelineEvent,
  UserMindState,
} from '@/core/models';

/**
 * The learner text an event carries: the utterance, or the quiz answer.
 */
export function userInputOf(event: Readonly<TimelineEvent>): string {
  return event.text || event.answer || '';
}

// ============================================================================
// Keyword tables
// ============================================================================

const CONFUSION_KEYWORDS = [
  "don't understand",
  'do not understand',
  'confused',
  'what do you mean',
  'lost me',
  '不懂',
  '不明白',
  '什么意思',
];

const EXAMPLE_KEYWORDS = ['example', 'for instance', 'such as', '例如', '比如', '举例', '案例'];

const META_KEYWORDS = [
  'slow down',
  'speed up',
  'start over',
  'how long',
  'take a break',
  'repeat that',
  'what are we doing',
];

const OFF_TOPIC_KEYWORDS = ['by the way', 'off topic', 'unrelated', 'random question'];

const BRANCH_KEYWORDS = ['what about', 'what if', 'how about', 'side question', 'related question'];

const DEEPEN_KEYWORDS = ['tell me more', 'go deeper', 'why does', 'how does', 'explain more'];

function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

function hasQuestionMark(text: string): boolean {
  return text.includes('?') || text.includes('？');
}

// ============================================================================
// Inference
// ============================================================================

/**
 * RESCUE when anything suggests the learner is struggling, FLOW otherwise.
 */
export function inferFlowMode(state: Readonly<SessionState>, userInput: string): FlowMode {
  if (state.misconceptionTags.length > 0) return 'RESCUE';
  if (state.masteryEstimate < 0.4) return 'RESCUE';
  if (state.cognitiveLoad > 7 || state.tensionLevel > 7) return 'RESCUE';
  if (containsAny(userInput, CONFUSION_KEYWORDS)) return 'RESCUE';
  return 'FLOW';
}

/**
 * Infers the learner's mind state. Fatigue wins outright; the other tags
 * accumulate, and Engaged stands in when none apply.
 */
export function inferUserMindState(state: Readonly<SessionState>, userInput: string): UserMindState[] {
  if (state.signals.lastUserChars < 10 && state.signals.lastUserLatencyMs > 5000) {
    return ['Fatigue'];
  }

  const states: UserMindState[] = [];
  const hasMisconceptions = state.misconceptionTags.length > 0;
  const mastery = state.masteryEstimate;

  if (hasMisconceptions && state.cognitiveLoad > 6) states.push('Fog');
  if (mastery < 0.4 && state.tensionLevel < 4) states.push('Illusion');
  if (mastery >= 0.4 && mastery < 0.7) states.push('Partial');
  if (mastery >= 0.7 && !hasMisconceptions) states.push('Aha');
  if (hasQuestionMark(userInput)) states.push('Verify');
  if (containsAny(userInput, EXAMPLE_KEYWORDS)) states.push('Expand');

  return states.length > 0 ? states : ['Engaged'];
}

/**
 * Classifies what the learner is trying to do with their latest input.
 *
 * @example
 * inferIntent('');                       // 'continue'
 * inferIntent('I am confused');          // 'clarify'
 * inferIntent('what about savings');     // 'branch'
 */
export function inferIntent(userInput: string): Intent {
  const text = userInput.trim();
  if (text === '') return 'continue';
  if (containsAny(text, CONFUSION_KEYWORDS) || hasQuestionMark(text)) return 'clarify';
  if (containsAny(text, META_KEYWORDS)) return 'meta';
  if (containsAny(text, OFF_TOPIC_KEYWORDS)) return 'off_topic';
  if (containsAny(text, BRANCH_KEYWORDS)) return 'branch';
  if (containsAny(text, DEEPEN_KEYWORDS)) return 'deepen';
  return 'continue';
}

/**
 * Narrows the beats worth considering. Order matters: the heuristic Director
 * takes the first candidate.
 *
 * A silent learner (output clock at or past the threshold) and a fatigued
 * learner short-circuit the other rules.
 */
export function generateBeatCandidates(
  state: Readonly<SessionState>,
  flowMode: FlowMode,
  userMindState: readonly UserMindState[],
  outputClockThresholdSec: number
): string[] {
  if (state.outputClockSec >= outputClockThresholdSec) {
    return ['check', 'feynman', 'exit_ticket'];
  }

  if (userMindState.includes('Fatigue')) {
    return ['minigame', 'exit_ticket'];
  }

  const candidates: string[] = [];
  if (flowMode === 'FLOW') {
    candidates.push('continue', 'deepen', 'check');
  } else {
    if (userMindState.includes('Fog')) candidates.push('reveal', 'lens_shift');
    if (userMindState.includes('Illusion')) candidates.push('twist', 'check');
    if (userMindState.includes('Partial')) candidates.push('lens_shift', 'deepen');
    if (userMindState.includes('Aha')) candidates.push('feynman', 'check');
    if (userMindState.includes('Verify')) candidates.push('deepen', 'check');
    if (userMindState.includes('Expand')) candidates.push('montage', 'deepen');
  }

  if (candidates.length === 0) {
    return ['continue', 'check'];
  }
  return [...new Set(candidates)];
}

/**
 * Park a branch question, resume the oldest parked one when the learner is
 * ready to continue, or leave the stack alone.
 */
export function decideStackAction(intent: Intent, questionStackSize: number): StackAction {
  if (intent === 'branch') return 'push';
  if (intent === 'continue' && questionStackSize > 0) return 'pop';
  return 'keep';
}

/** Goal for a 0..10 level: raise it below 4, lower it above 7 */
export function goalForLevel(level: number): Goal {
  if (level < 4) return 'increase';
  if (level > 7) return 'decrease';
  return 'maintain';
}

/**
 * Generic content direction used when no provider wrote one.
 */
export function defaultContentDirection(beat: string, userMindState: readonly UserMindState[]): string {
  switch (beat) {
    case 'twist':
      return "Pick a counterexample close to the learner's last answer where the conclusion seems to fail, and make them explain why.";
    case 'reveal':
      return 'Map the abstract idea onto an everyday situation the learner knows: a concrete choice, its cost and its payoff.';
    case 'check':
      return 'Ask one minimal question about the key point of this turn, with a single variable the learner must commit to.';
    case 'continue':
      return userMindState.includes('Engaged')
        ? "Follow the learner's interest one small step further with an example from the same context. Do not switch topics."
        : 'Move one small step along the recent context, carried by a familiar example.';
    default:
      return 'Reuse material from the recent context that the learner already knows, and keep it concrete.';
  }
}
