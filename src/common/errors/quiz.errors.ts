import { HttpException, HttpStatus } from '@nestjs/common';
import { RejectedBlock } from '../interfaces/parsed-quiz.interface';

export type QuizErrorCode =
  | 'NoValidQuestionsFound'
  | 'UnsupportedFormat'
  | 'ExtractionError'
  | 'QuizNotFound'
  | 'QuestionNotFound'
  | 'AnswerNotFound'
  | 'AccessDenied'
  | 'AttemptNotFound'
  | 'AttemptAlreadyCompleted'
  | 'Unauthorized';

/**
 * Base for every domain failure. The response body always carries `code`
 * next to Nest's usual `statusCode` and `message`.
 */
export class QuizError extends HttpException {
  constructor(
    readonly code: QuizErrorCode,
    message: string,
    status: HttpStatus,
    details: Record<string, unknown> = {},
  ) {
    super({ statusCode: status, code, message, ...details }, status);
  }
}

export class NoValidQuestionsFoundError extends QuizError {
  constructor(readonly rejectedBlocks: RejectedBlock[]) {
    super(
      'NoValidQuestionsFound',
      'No valid questions were found in the document',
      HttpStatus.UNPROCESSABLE_ENTITY,
      { rejectedBlocks },
    );
  }
}

export class UnsupportedFormatError extends QuizError {
  constructor(format: string) {
    super(
      'UnsupportedFormat',
      `Unsupported document format: ${format}`,
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

export class ExtractionError extends QuizError {
  constructor(reason: string) {
    super(
      'ExtractionError',
      `Could not read document: ${reason}`,
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

export class QuizNotFoundError extends QuizError {
  constructor(quizId: string) {
    super('QuizNotFound', `Quiz ${quizId} not found`, HttpStatus.NOT_FOUND);
  }
}

export class QuestionNotFoundError extends QuizError {
  constructor(questionId: string) {
    super(
      'QuestionNotFound',
      `Question ${questionId} not found in this quiz`,
      HttpStatus.NOT_FOUND,
    );
  }
}

export class AnswerNotFoundError extends QuizError {
  constructor(answerId: string) {
    super(
      'AnswerNotFound',
      `Answer ${answerId} not found for this question`,
      HttpStatus.NOT_FOUND,
    );
  }
}

export class AccessDeniedError extends QuizError {
  constructor(
    readonly quizId: string,
    readonly cost: number,
  ) {
    super(
      'AccessDenied',
      `Access to quiz ${quizId} has not been granted`,
      HttpStatus.PAYMENT_REQUIRED,
      { quizId, cost },
    );
  }
}

export class AttemptNotFoundError extends QuizError {
  constructor(attemptId: string) {
    super(
      'AttemptNotFound',
      `Attempt ${attemptId} not found`,
      HttpStatus.NOT_FOUND,
    );
  }
}

export class AttemptAlreadyCompletedError extends QuizError {
  constructor(attemptId: string) {
    super(
      'AttemptAlreadyCompleted',
      `Attempt ${attemptId} is already completed`,
      HttpStatus.CONFLICT,
    );
  }
}

export class AttemptOwnershipError extends QuizError {
  constructor(attemptId: string) {
    super(
      'Unauthorized',
      `Attempt ${attemptId} belongs to another user`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export interface ErrorPayload {
  code: string;
  message: string;
}

/** Flattens any thrown value into the `{ code, message }` shape sent to sockets. */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof QuizError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof HttpException) {
    return { code: HttpStatus[error.getStatus()], message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'InternalError', message: error.message };
  }
  return { code: 'InternalError', message: 'Unexpected error' };
}
