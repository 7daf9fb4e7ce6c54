export interface AttemptCounters {
  correctCount: number;
  wrongCount: number;
  skippedCount: number;
}

export interface BestSnapshot {
  bestCorrect: number;
  bestWrong: number;
  bestSkipped: number;
  bestDuration: number;
}

export interface Attempt extends AttemptCounters, BestSnapshot {
  id: string;
  quizId: string;
  userId: string;
  durationSeconds: number;
  createdAt: number;
  completedAt: number | null;
  abandoned: boolean;
}

export type AnswerCategory = 'correct' | 'wrong' | 'skipped';

export interface RecordedAnswer {
  attemptId: string;
  questionId: string;
  answerId: string | null; // null when skipped
  isCorrect: boolean;
  isSkipped: boolean;
  answeredAt: number;
}

export interface SessionContext {
  attemptId: string;
  startedAt: number;
  currentIndex: number;
}

export interface Ranking {
  position: number;
  betterCount: number;
  totalParticipants: number;
  percentile: number;
}

export interface AttemptResult {
  attemptId: string;
  quizId: string;
  quizName: string;
  totalQuestions: number;
  correctCount: number;
  wrongCount: number;
  skippedCount: number;
  durationSeconds: number;
  best: {
    correct: number;
    wrong: number;
    skipped: number;
    durationSeconds: number;
  };
  hasPreviousResults: boolean;
  ranking: Ranking;
}

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  attemptId: string;
  correctCount: number;
  durationSeconds: number;
}
