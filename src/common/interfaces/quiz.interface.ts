export interface Quiz {
  id: string;
  name: string;
  creatorId: string;
  fileRef: string | null;
  questionCount: number;
  createdAt: number;
}

export interface Question {
  id: string;
  quizId: string;
  number: number; // as written in the source document
  position: number; // 1-based, unique within the quiz
  text: string;
}

export interface Answer {
  id: string;
  questionId: string;
  text: string;
  isCorrect: boolean;
  letter: string; // origin letter, never shown to players
}

export interface DisplayAnswer {
  label: string;
  answerId: string;
  text: string;
}
