import { DisplayAnswer } from './quiz.interface';
import {
  AnswerCategory,
  Attempt,
  AttemptCounters,
  AttemptResult,
} from './attempt.interface';

export type SessionStart =
  | {
      status: 'started' | 'resumed';
      attempt: Attempt;
      questionIndex: number;
      totalQuestions: number;
    }
  | { status: 'completed'; attempt: Attempt; result: AttemptResult };

export type AdvanceResult =
  | { status: 'question'; questionIndex: number; totalQuestions: number }
  | { status: 'completed'; result: AttemptResult };

export interface QuestionView {
  attemptId: string;
  quizId: string;
  questionId: string;
  questionNumber: number;
  index: number;
  total: number;
  text: string;
  answers: DisplayAnswer[];
  previous: {
    answerId: string | null;
    category: AnswerCategory;
  } | null;
}

export interface AnswerFeedback {
  attemptId: string;
  questionId: string;
  category: AnswerCategory;
  correctAnswerText: string | null;
  counters: AttemptCounters;
}

export interface RecordAnswerResult {
  attempt: Attempt;
  category: AnswerCategory;
  previousCategory: AnswerCategory | null;
  correctAnswerText: string | null;
}
