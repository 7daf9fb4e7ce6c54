import { Injectable, Logger } from '@nestjs/common';
import { QuizStore } from '../store/quiz.store';
import { TextExtractor } from '../parser/text-extractor';
import { parseQuizText } from '../parser/quiz-format.parser';
import { assembleQuiz } from '../parser/quiz.assembler';
import { calculateQuizCost } from '../billing/cost';
import {
  NoValidQuestionsFoundError,
  QuizNotFoundError,
} from '../../common/errors/quiz.errors';
import {
  QuizDraft,
  RejectedBlock,
} from '../../common/interfaces/parsed-quiz.interface';
import { Quiz } from '../../common/interfaces/quiz.interface';

export interface CreatedQuiz {
  quiz: Quiz;
  cost: number;
  rejectedBlocks: RejectedBlock[];
}

@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);

  constructor(
    private readonly store: QuizStore,
    private readonly textExtractor: TextExtractor,
  ) {}

  async createFromText(
    creatorId: string,
    name: string,
    text: string,
  ): Promise<CreatedQuiz> {
    const draft = this.assemble(name, text);
    const quiz = await this.store.createQuiz(creatorId, draft);

    this.logger.log(
      `Quiz ${quiz.id} "${quiz.name}" created by ${creatorId} with ${quiz.questionCount} questions`,
    );

    return {
      quiz,
      cost: calculateQuizCost(quiz.questionCount),
      rejectedBlocks: draft.rejectedBlocks,
    };
  }

  async createFromDocument(
    creatorId: string,
    name: string,
    content: Buffer,
    format: string,
    fileName?: string,
  ): Promise<CreatedQuiz> {
    const text = await this.textExtractor.extract(content, format);
    const created = await this.createFromText(creatorId, name, text);

    if (fileName) {
      await this.store.attachFile(created.quiz.id, fileName);
      created.quiz = { ...created.quiz, fileRef: fileName };
    }
    return created;
  }

  async listQuizzes(): Promise<Quiz[]> {
    return this.store.listQuizzes();
  }

  async getQuiz(quizId: string): Promise<Quiz> {
    const quiz = await this.store.getQuiz(quizId);
    if (!quiz) throw new QuizNotFoundError(quizId);
    return quiz;
  }

  private assemble(name: string, text: string): QuizDraft {
    const blocks = parseQuizText(text);

    try {
      const draft = assembleQuiz(blocks, name);
      this.logRejections(name, draft.rejectedBlocks);
      return draft;
    } catch (error) {
      if (error instanceof NoValidQuestionsFoundError) {
        this.logRejections(name, error.rejectedBlocks);
      }
      throw error;
    }
  }

  private logRejections(name: string, rejected: RejectedBlock[]) {
    for (const block of rejected) {
      this.logger.warn(
        `Dropped block ${block.blockIndex} of "${name}" (${block.reason}): ${block.message}`,
      );
    }
  }
}
