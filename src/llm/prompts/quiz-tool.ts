/**
 * Quiz Tool
 *
 * In generate mode the speaking role may show the learner a multiple-choice
 * question alongside its line. The question arrives as a `show_quiz` tool
 * call; its input is validated here before it reaches the reply.
 */

import { z } from 'zod';
import type { QuizQuestion } from '@/core/models';
import type { LLMTool, LLMToolCall } from '../types';

export const SHOW_QUIZ_TOOL_NAME = 'show_quiz';

export const SHOW_QUIZ_TOOL: LLMTool = {
  name: SHOW_QUIZ_TOOL_NAME,
  description:
    'Show the learner one multiple-choice question to check understanding or to let them choose a direction. ' +
    'Only call it when the strategy asks the learner to answer, check or choose.',
  inputSchema: {
    type: 'object',
    properties: {
      quiz_id: { type: 'string', description: 'Unique identifier of the question' },
      question: { type: 'string', description: 'The question, phrased conversationally' },
      options: {
        type: 'array',
        items: { type: 'string' },
        description: 'The answer options, one string each',
      },
      context: { type: 'string', description: 'Optional note on what the question is about' },
    },
    required: ['quiz_id', 'question', 'options'],
  },
};

const quizInputSchema = z.object({
  quiz_id: z.string().min(1),
  question: z.string().min(1),
  options: z.array(z.string().min(1)).min(1),
  context: z.string().optional(),
});

/**
 * The question from the first valid `show_quiz` call, or null. Invalid calls
 * are logged and skipped.
 *
 * @example
 * ```typescript
 * const quiz = parseQuizToolCalls(response.toolCalls);
 * ```
 */
export function parseQuizToolCalls(calls: readonly LLMToolCall[]): QuizQuestion | null {
  for (const call of calls) {
    if (call.name !== SHOW_QUIZ_TOOL_NAME) continue;

    const result = quizInputSchema.safeParse(call.input);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      console.warn(`[LLM] Ignoring invalid ${SHOW_QUIZ_TOOL_NAME} call: ${issues}`);
      continue;
    }

    return {
      id: result.data.quiz_id,
      prompt: result.data.question,
      options: result.data.options,
    };
  }
  return null;
}
