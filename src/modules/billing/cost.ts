import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';

const { BASE_COST, COST_STEP } = QUIZ_CONFIG;

/**
 * Access price for a quiz of `questionCount` questions.
 *
 * Up to 100 questions cost the base price, 101-199 one step more and
 * 200-299 two steps. From 300 on, every started hundred past 300 adds a step.
 */
export function calculateQuizCost(questionCount: number): number {
  if (questionCount <= 100) return BASE_COST;
  if (questionCount < 200) return BASE_COST + COST_STEP;
  if (questionCount < 300) return BASE_COST + 2 * COST_STEP;

  const extraHundreds = Math.ceil((questionCount - 300) / 100);
  return BASE_COST + 2 * COST_STEP + extraHundreds * COST_STEP;
}
