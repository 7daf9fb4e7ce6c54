import { v4 as uuidv4 } from 'uuid';
import { QuizDraft } from '../../common/interfaces/parsed-quiz.interface';
import {
  Answer,
  Question,
  Quiz,
} from '../../common/interfaces/quiz.interface';
import {
  Attempt,
  RecordedAnswer,
  SessionContext,
} from '../../common/interfaces/attempt.interface';

export interface MaterializedQuiz {
  quiz: Quiz;
  questions: Question[];
  answers: Answer[];
}

/**
 * Persistence contract of the quiz core. Records reference each other by id
 * only; relationships are always queries.
 */
export abstract class QuizStore {
  // Quizzes
  abstract createQuiz(creatorId: string, draft: QuizDraft): Promise<Quiz>;
  abstract attachFile(quizId: string, fileRef: string): Promise<void>;
  abstract getQuiz(quizId: string): Promise<Quiz | null>;
  abstract listQuizzes(): Promise<Quiz[]>;
  /** Ordered by position. */
  abstract getQuestions(quizId: string): Promise<Question[]>;
  abstract getQuestion(questionId: string): Promise<Question | null>;
  abstract getAnswers(questionId: string): Promise<Answer[]>;

  // Attempts
  abstract createAttempt(quizId: string, userId: string): Promise<Attempt>;
  abstract getAttempt(attemptId: string): Promise<Attempt | null>;
  abstract saveAttempt(attempt: Attempt): Promise<void>;
  abstract findInProgressAttempt(
    userId: string,
    quizId: string,
  ): Promise<Attempt | null>;
  abstract listInProgressAttempts(
    userId: string,
    quizId: string,
  ): Promise<Attempt[]>;
  /** Completed and not abandoned. */
  abstract listCompletedAttempts(quizId: string): Promise<Attempt[]>;
  abstract countCompletedAttempts(quizId: string): Promise<number>;

  // Recorded answers
  abstract getRecordedAnswer(
    attemptId: string,
    questionId: string,
  ): Promise<RecordedAnswer | null>;
  abstract upsertRecordedAnswer(answer: RecordedAnswer): Promise<void>;
  abstract listRecordedAnswers(attemptId: string): Promise<RecordedAnswer[]>;
  abstract listRecordedAnswerQuestionIds(attemptId: string): Promise<string[]>;

  // Session contexts
  abstract getSessionContext(attemptId: string): Promise<SessionContext | null>;
  abstract saveSessionContext(context: SessionContext): Promise<void>;
  abstract deleteSessionContext(attemptId: string): Promise<void>;

  // Access grants
  abstract hasAccessGrant(userId: string, quizId: string): Promise<boolean>;
  /** Resolves true when the grant did not exist before. */
  abstract grantAccess(userId: string, quizId: string): Promise<boolean>;

  /** Runs `task` while holding an exclusive lock on `key`. */
  abstract withLock<T>(key: string, task: () => Promise<T>): Promise<T>;
}

export function materializeQuiz(
  creatorId: string,
  draft: QuizDraft,
  now: number = Date.now(),
): MaterializedQuiz {
  const quiz: Quiz = {
    id: uuidv4(),
    name: draft.name,
    creatorId,
    fileRef: null,
    questionCount: draft.questions.length,
    createdAt: now,
  };
  const questions: Question[] = [];
  const answers: Answer[] = [];

  for (const questionDraft of draft.questions) {
    const question: Question = {
      id: uuidv4(),
      quizId: quiz.id,
      number: questionDraft.number,
      position: questionDraft.position,
      text: questionDraft.text,
    };
    questions.push(question);

    for (const answerDraft of questionDraft.answers) {
      answers.push({
        id: uuidv4(),
        questionId: question.id,
        text: answerDraft.text,
        isCorrect: answerDraft.isCorrect,
        letter: answerDraft.letter,
      });
    }
  }

  return { quiz, questions, answers };
}

export function buildAttempt(
  quizId: string,
  userId: string,
  now: number = Date.now(),
): Attempt {
  return {
    id: uuidv4(),
    quizId,
    userId,
    correctCount: 0,
    wrongCount: 0,
    skippedCount: 0,
    durationSeconds: 0,
    createdAt: now,
    completedAt: null,
    abandoned: false,
    bestCorrect: 0,
    bestWrong: 0,
    bestSkipped: 0,
    bestDuration: 0,
  };
}
