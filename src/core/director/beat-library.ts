/**
 * Beat Library
 *
 * One card per strategy beat. The cards are shown to the delegated Director
 * so it can choose between beats, and the talk-burst hints bound what a
 * single turn of that beat should take.
 */

import { ValidationError } from '@/core/errors';

export interface BeatCard {
  beatId: string;
  /** What the beat is for */
  goal: string;
  /** What the learner is expected to produce during the beat */
  userMustDoType: string;
  /** Suggested spoken length in seconds */
  talkBurstLimitHint: number;
  /** When the beat has done its job */
  exitCondition: string;
  /** Beats that usually follow */
  nextSuggest: string[];
}

/** Beats that force the learner to produce output */
export const OUTPUT_BEATS: readonly string[] = ['check', 'feynman', 'exit_ticket'];

export const BEAT_LIBRARY: Readonly<Record<string, BeatCard>> = {
  reveal: {
    beatId: 'reveal',
    goal: 'Explain the core concept with a simple metaphor',
    userMustDoType: 'restate the idea',
    talkBurstLimitHint: 20,
    exitCondition: 'The learner restates the metaphor in their own words',
    nextSuggest: ['check', 'lens_shift'],
  },
  check: {
    beatId: 'check',
    goal: 'Quickly check understanding and force an answer',
    userMustDoType: 'answer a question',
    talkBurstLimitHint: 15,
    exitCondition: 'The learner gives a clear answer',
    nextSuggest: ['deepen', 'twist', 'continue'],
  },
  deepen: {
    beatId: 'deepen',
    goal: 'Follow the mechanism chain to a deeper understanding',
    userMustDoType: 'explain the reasoning',
    talkBurstLimitHint: 25,
    exitCondition: 'The learner explains the cause and effect',
    nextSuggest: ['check', 'feynman'],
  },
  twist: {
    beatId: 'twist',
    goal: 'Break an illusion of understanding with a counterexample',
    userMustDoType: 'rethink',
    talkBurstLimitHint: 20,
    exitCondition: 'The learner notices the contradiction',
    nextSuggest: ['reveal', 'check'],
  },
  continue: {
    beatId: 'continue',
    goal: 'Keep the narrative moving in small steps',
    userMustDoType: 'follow along',
    talkBurstLimitHint: 20,
    exitCondition: 'A natural transition to the next point',
    nextSuggest: ['check', 'deepen'],
  },
  lens_shift: {
    beatId: 'lens_shift',
    goal: 'Explain again from another angle and clarify the boundaries',
    userMustDoType: 'compare the views',
    talkBurstLimitHint: 25,
    exitCondition: 'The learner tells the perspectives apart',
    nextSuggest: ['check', 'deepen'],
  },
  feynman: {
    beatId: 'feynman',
    goal: 'Have the learner teach the idea to someone else',
    userMustDoType: 'teach it',
    talkBurstLimitHint: 30,
    exitCondition: 'The learner teaches it clearly to an imagined listener',
    nextSuggest: ['montage', 'exit_ticket'],
  },
  montage: {
    beatId: 'montage',
    goal: 'Cut quickly through several scenes to show transfer',
    userMustDoType: 'spot the pattern',
    talkBurstLimitHint: 30,
    exitCondition: 'The learner names the pattern shared by the scenes',
    nextSuggest: ['exit_ticket'],
  },
  minigame: {
    beatId: 'minigame',
    goal: 'Lower the load with a short interactive game',
    userMustDoType: 'take part',
    talkBurstLimitHint: 20,
    exitCondition: 'The learner finishes the game',
    nextSuggest: ['continue', 'exit_ticket'],
  },
  exit_ticket: {
    beatId: 'exit_ticket',
    goal: 'Final check that the idea transfers to a new situation',
    userMustDoType: 'apply it',
    talkBurstLimitHint: 15,
    exitCondition: 'The learner answers the transfer question',
    nextSuggest: [],
  },
};

/**
 * Returns the card for a beat, or undefined for beats outside the library.
 */
export function getBeatCard(beatId: string): BeatCard | undefined {
  return Object.prototype.hasOwnProperty.call(BEAT_LIBRARY, beatId) ? BEAT_LIBRARY[beatId] : undefined;
}

export function isOutputBeat(beat: string): boolean {
  return OUTPUT_BEATS.includes(beat);
}

/**
 * The output beat the guardrails and the fallback plan fall back to: the
 * first member of OUTPUT_BEATS the configuration allows.
 *
 * @throws {ValidationError} If no output beat is configured
 */
export function resolveOutputBeat(availableBeats: readonly string[]): string {
  const beat = OUTPUT_BEATS.find((candidate) => availableBeats.includes(candidate));
  if (beat === undefined) {
    throw new ValidationError(`Available beats must include one of ${OUTPUT_BEATS.join(', ')}`);
  }
  return beat;
}
