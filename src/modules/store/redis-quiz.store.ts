import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RedisService } from '../redis/redis.service';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';
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
import { QuizStore, buildAttempt, materializeQuiz } from './quiz.store';

const keys = {
  quizIndex: 'quizzes',
  quiz: (quizId: string) => `quiz:${quizId}`,
  quizQuestions: (quizId: string) => `quiz:${quizId}:questions`,
  question: (questionId: string) => `question:${questionId}`,
  questionAnswers: (questionId: string) => `question:${questionId}:answers`,
  answer: (answerId: string) => `answer:${answerId}`,
  attempt: (attemptId: string) => `attempt:${attemptId}`,
  attemptAnswers: (attemptId: string) => `attempt:${attemptId}:answers`,
  openAttempts: (userId: string, quizId: string) =>
    `attempts:open:${userId}:${quizId}`,
  completedAttempts: (quizId: string) => `attempts:completed:${quizId}`,
  session: (attemptId: string) => `session:${attemptId}`,
  access: (userId: string) => `access:${userId}`,
};

@Injectable()
export class RedisQuizStore extends QuizStore {
  private readonly sessionTtlSeconds: number;

  constructor(
    private readonly redisService: RedisService,
    configService: ConfigService,
  ) {
    super();
    this.sessionTtlSeconds = Number(
      configService.get(
        'SESSION_CONTEXT_TTL_SECONDS',
        QUIZ_CONFIG.SESSION_CONTEXT_TTL_SECONDS,
      ),
    );
  }

  private get client() {
    return this.redisService.client;
  }

  async createQuiz(creatorId: string, draft: QuizDraft): Promise<Quiz> {
    const { quiz, questions, answers } = materializeQuiz(creatorId, draft);
    const pipeline = this.client.multi();

    pipeline.set(keys.quiz(quiz.id), JSON.stringify(quiz));
    for (const question of questions) {
      pipeline.set(keys.question(question.id), JSON.stringify(question));
      pipeline.rpush(keys.quizQuestions(quiz.id), question.id);
    }
    for (const answer of answers) {
      pipeline.set(keys.answer(answer.id), JSON.stringify(answer));
      pipeline.rpush(keys.questionAnswers(answer.questionId), answer.id);
    }
    pipeline.lpush(keys.quizIndex, quiz.id);

    await pipeline.exec();
    return quiz;
  }

  async attachFile(quizId: string, fileRef: string): Promise<void> {
    const quiz = await this.getQuiz(quizId);
    if (!quiz) return;
    quiz.fileRef = fileRef;
    await this.client.set(keys.quiz(quizId), JSON.stringify(quiz));
  }

  async getQuiz(quizId: string): Promise<Quiz | null> {
    return this.redisService.getJson<Quiz>(keys.quiz(quizId));
  }

  async listQuizzes(): Promise<Quiz[]> {
    const quizIds = await this.client.lrange(keys.quizIndex, 0, -1);
    return this.redisService.getJsonMany<Quiz>(quizIds.map(keys.quiz));
  }

  async getQuestions(quizId: string): Promise<Question[]> {
    const questionIds = await this.client.lrange(
      keys.quizQuestions(quizId),
      0,
      -1,
    );
    const questions = await this.redisService.getJsonMany<Question>(
      questionIds.map(keys.question),
    );
    return questions.sort((a, b) => a.position - b.position);
  }

  async getQuestion(questionId: string): Promise<Question | null> {
    return this.redisService.getJson<Question>(keys.question(questionId));
  }

  async getAnswers(questionId: string): Promise<Answer[]> {
    const answerIds = await this.client.lrange(
      keys.questionAnswers(questionId),
      0,
      -1,
    );
    return this.redisService.getJsonMany<Answer>(answerIds.map(keys.answer));
  }

  async createAttempt(quizId: string, userId: string): Promise<Attempt> {
    const attempt = buildAttempt(quizId, userId);
    await this.client
      .multi()
      .set(keys.attempt(attempt.id), JSON.stringify(attempt))
      .sadd(keys.openAttempts(userId, quizId), attempt.id)
      .exec();
    return attempt;
  }

  async getAttempt(attemptId: string): Promise<Attempt | null> {
    return this.redisService.getJson<Attempt>(keys.attempt(attemptId));
  }

  async saveAttempt(attempt: Attempt): Promise<void> {
    const pipeline = this.client
      .multi()
      .set(keys.attempt(attempt.id), JSON.stringify(attempt));

    if (attempt.completedAt !== null) {
      pipeline.srem(keys.openAttempts(attempt.userId, attempt.quizId), attempt.id);
      if (!attempt.abandoned) {
        pipeline.sadd(keys.completedAttempts(attempt.quizId), attempt.id);
      }
    }

    await pipeline.exec();
  }

  async findInProgressAttempt(
    userId: string,
    quizId: string,
  ): Promise<Attempt | null> {
    const attempts = await this.listInProgressAttempts(userId, quizId);
    // Latest wins if more than one slipped through
    return attempts.sort((a, b) => b.createdAt - a.createdAt)[0] ?? null;
  }

  async listInProgressAttempts(
    userId: string,
    quizId: string,
  ): Promise<Attempt[]> {
    const attemptIds = await this.client.smembers(
      keys.openAttempts(userId, quizId),
    );
    const attempts = await this.redisService.getJsonMany<Attempt>(
      attemptIds.map(keys.attempt),
    );
    return attempts.filter((attempt) => attempt.completedAt === null);
  }

  async listCompletedAttempts(quizId: string): Promise<Attempt[]> {
    const attemptIds = await this.client.smembers(
      keys.completedAttempts(quizId),
    );
    return this.redisService.getJsonMany<Attempt>(attemptIds.map(keys.attempt));
  }

  async countCompletedAttempts(quizId: string): Promise<number> {
    return this.client.scard(keys.completedAttempts(quizId));
  }

  async getRecordedAnswer(
    attemptId: string,
    questionId: string,
  ): Promise<RecordedAnswer | null> {
    const data = await this.client.hget(
      keys.attemptAnswers(attemptId),
      questionId,
    );
    if (!data) return null;
    const recorded: RecordedAnswer = JSON.parse(data);
    return recorded;
  }

  async upsertRecordedAnswer(answer: RecordedAnswer): Promise<void> {
    await this.client.hset(
      keys.attemptAnswers(answer.attemptId),
      answer.questionId,
      JSON.stringify(answer),
    );
  }

  async listRecordedAnswers(attemptId: string): Promise<RecordedAnswer[]> {
    const rows = await this.client.hvals(keys.attemptAnswers(attemptId));
    return rows.map((row) => {
      const recorded: RecordedAnswer = JSON.parse(row);
      return recorded;
    });
  }

  async listRecordedAnswerQuestionIds(attemptId: string): Promise<string[]> {
    return this.client.hkeys(keys.attemptAnswers(attemptId));
  }

  async getSessionContext(attemptId: string): Promise<SessionContext | null> {
    return this.redisService.getJson<SessionContext>(keys.session(attemptId));
  }

  async saveSessionContext(context: SessionContext): Promise<void> {
    await this.client.setex(
      keys.session(context.attemptId),
      this.sessionTtlSeconds,
      JSON.stringify(context),
    );
  }

  async deleteSessionContext(attemptId: string): Promise<void> {
    await this.client.del(keys.session(attemptId));
  }

  async hasAccessGrant(userId: string, quizId: string): Promise<boolean> {
    return (await this.client.sismember(keys.access(userId), quizId)) === 1;
  }

  async grantAccess(userId: string, quizId: string): Promise<boolean> {
    return (await this.client.sadd(keys.access(userId), quizId)) === 1;
  }

  async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    return this.redisService.withLock(key, task);
  }
}
