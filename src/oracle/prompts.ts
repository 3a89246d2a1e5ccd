import type { LLMMessage } from '../providers/types.js';

export const FINAL_ANSWER_MARKER = 'FINAL ANSWER:';

const REFINE_SYSTEM_PROMPT = `You are a careful problem solver improving your own work.
You will see a problem and, when there are any, your previous attempts at it, oldest first.
Critique the latest attempt: point out mistakes, gaps and unjustified steps. Then write a
complete, improved solution that fixes them. The solution must stand on its own; do not refer
to earlier attempts.

When you are confident the solution is correct and complete, end it with a line starting with
"${FINAL_ANSWER_MARKER}" followed by the final answer.

Respond in this format:
CRITIQUE:
<your critique>
SOLUTION:
<your improved solution>`;

const SCORE_SYSTEM_PROMPT = `You are a strict grader. Given a problem and a proposed solution, rate how
correct, complete and well reasoned the solution is on a scale from 0 to 100, where 100 means
certainly correct and fully justified. Be harsh: any error should cost points.

Respond with ONLY the integer score.`;

export function buildRefineMessages(history: readonly string[]): LLMMessage[] {
  const [problem, ...attempts] = history;
  const parts = [`## Problem\n${problem ?? ''}`];

  if (attempts.length === 0) {
    parts.push('## Previous attempts\nNone yet. Draft a first solution, then critique and improve it.');
  } else {
    attempts.forEach((attempt, index) => {
      parts.push(`## Attempt ${index + 1}\n${attempt}`);
    });
  }

  return [
    { role: 'system', content: REFINE_SYSTEM_PROMPT },
    { role: 'user', content: parts.join('\n\n') },
  ];
}

export function buildScoreMessages(content: string, problem: string): LLMMessage[] {
  return [
    { role: 'system', content: SCORE_SYSTEM_PROMPT },
    { role: 'user', content: `## Problem\n${problem}\n\n## Proposed solution\n${content}` },
  ];
}
