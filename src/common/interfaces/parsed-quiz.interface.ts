export interface ParsedAnswer {
  text: string;
  isCorrect: boolean;
}

export interface ParsedQuestion {
  number: number;
  text: string;
  answers: ParsedAnswer[];
}

export interface ParsedBlock {
  questions: ParsedQuestion[];
}

export type BlockRejectionReason =
  | 'EmptyBlock'
  | 'MissingQuestionText'
  | 'InsufficientAnswers'
  | 'AmbiguousCorrectMarker';

export type BlockValidation =
  | { ok: true }
  | {
      ok: false;
      reason: BlockRejectionReason;
      questionNumber?: number;
      message: string;
    };

export interface RejectedBlock {
  blockIndex: number;
  reason: BlockRejectionReason;
  questionNumber?: number;
  message: string;
}

export interface QuestionDraft {
  number: number;
  position: number;
  text: string;
  answers: AnswerDraft[];
}

export interface AnswerDraft {
  text: string;
  isCorrect: boolean;
  letter: string;
}

export interface QuizDraft {
  name: string;
  questions: QuestionDraft[];
  rejectedBlocks: RejectedBlock[];
}
