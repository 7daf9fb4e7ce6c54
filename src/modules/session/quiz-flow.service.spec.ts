import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { QuizFlowService } from './quiz-flow.service';
import { SessionService } from './session.service';
import { AnswerRandomizer, RANDOM_SOURCE } from './answer-randomizer';
import { BillingService } from '../billing/billing.service';
import { ScoringService } from '../scoring/scoring.service';
import { QuizStore } from '../store/quiz.store';
import { InMemoryQuizStore } from '../store/testing/in-memory-quiz.store';
import { assembleQuiz } from '../parser/quiz.assembler';
import { parseQuizText } from '../parser/quiz-format.parser';
import { MessageBufferPresenter } from './presenters/message-buffer.presenter';
import { SocketPresenter } from './presenters/socket.presenter';
import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';
import { AccessDeniedError } from '../../common/errors/quiz.errors';
import { Question } from '../../common/interfaces/quiz.interface';

const USER = 'user-1';

describe('QuizFlowService', () => {
  let flow: QuizFlowService;
  let store: InMemoryQuizStore;
  let quizId: string;
  let questions: Question[];

  async function answerId(index: number, correct: boolean): Promise<string> {
    const answers = await store.getAnswers(questions[index].id);
    const found = answers.find((a) => a.isCorrect === correct);
    if (!found) throw new Error('answer missing');
    return found.id;
  }

  beforeEach(async () => {
    store = new InMemoryQuizStore();

    const module = await Test.createTestingModule({
      providers: [
        QuizFlowService,
        SessionService,
        BillingService,
        ScoringService,
        AnswerRandomizer,
        { provide: RANDOM_SOURCE, useValue: () => 0.999 },
        { provide: QuizStore, useValue: store },
        {
          provide: ConfigService,
          useValue: new ConfigService({ FEEDBACK_DELAY_MS: 0 }),
        },
      ],
    }).compile();

    flow = module.get(QuizFlowService);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    const quiz = await store.createQuiz(
      'creator',
      assembleQuiz(
        parseQuizText(
          '1. Question 1?\n#Right 1\nWrong 1\n2. Question 2?\nRight 2?\n#Right 2',
        ),
        'Two',
      ),
    );
    quizId = quiz.id;
    questions = await store.getQuestions(quizId);
    await store.grantAccess(USER, quizId);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render the first question on begin', async () => {
    const presenter = new MessageBufferPresenter();

    const start = await flow.begin(presenter, USER, quizId);

    expect(start.status).toBe('started');
    expect(presenter.messages).toEqual([
      '[1/2]\n\nQuestion 1?\n\nA. Right 1\nB. Wrong 1',
    ]);
    expect(presenter.lastView?.questionId).toBe(questions[0].id);
  });

  it('should acknowledge, then show the next question, then the summary', async () => {
    const presenter = new MessageBufferPresenter();
    const start = await flow.begin(presenter, USER, quizId);
    const attemptId = start.attempt.id;

    const next = await flow.answer(
      presenter,
      USER,
      attemptId,
      questions[0].id,
      await answerId(0, false),
      { pacingMs: 0 },
    );
    expect(next).toEqual({
      status: 'question',
      questionIndex: 1,
      totalQuestions: 2,
    });

    const last = await flow.answer(
      presenter,
      USER,
      attemptId,
      questions[1].id,
      await answerId(1, true),
      { pacingMs: 0 },
    );
    expect(last.status).toBe('completed');

    expect(presenter.messages.slice(1, 4)).toEqual([
      '❌ Wrong.\n\n✅ Correct answer: Right 1',
      '[2/2]\n\nQuestion 2?\n\nA. Right 2?\nB. Right 2',
      '✅ Correct!',
    ]);
    expect(presenter.messages).toHaveLength(5);
    expect(presenter.lastResult).toMatchObject({
      correctCount: 1,
      wrongCount: 1,
      skippedCount: 0,
    });
  });

  it('should show the next question once when the same answer arrives twice', async () => {
    const presenter = new MessageBufferPresenter();
    const start = await flow.begin(presenter, USER, quizId);
    const rightId = await answerId(0, true);

    const results = await Promise.all([
      flow.answer(presenter, USER, start.attempt.id, questions[0].id, rightId, {
        pacingMs: 0,
      }),
      flow.answer(presenter, USER, start.attempt.id, questions[0].id, rightId, {
        pacingMs: 0,
      }),
    ]);

    expect(results).toEqual([
      { status: 'question', questionIndex: 1, totalQuestions: 2 },
      { status: 'question', questionIndex: 1, totalQuestions: 2 },
    ]);
    expect(presenter.lastView?.questionId).toBe(questions[1].id);
    expect(presenter.lastResult).toBeNull();
    const attempt = await store.getAttempt(start.attempt.id);
    expect(attempt?.correctCount).toBe(1);
  });

  it('should wait for the pacing delay between feedback and next question', async () => {
    jest.useFakeTimers();
    try {
      const presenter = new MessageBufferPresenter();
      const start = await flow.begin(presenter, USER, quizId);

      const pending = flow.answer(
        presenter,
        USER,
        start.attempt.id,
        questions[0].id,
        null,
        { pacingMs: 1500 },
      );

      await jest.advanceTimersByTimeAsync(1499);
      expect(presenter.messages).toHaveLength(2);

      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(presenter.messages).toHaveLength(3);
      expect(presenter.messages[1]).toBe(
        '⏭ Skipped.\n\n✅ Correct answer: Right 1',
      );
    } finally {
      jest.useRealTimers();
    }
  });

  it('should emit structured events through the socket presenter', async () => {
    const emit = jest.fn();
    const presenter = new SocketPresenter({ emit });

    await flow.begin(presenter, USER, quizId);

    expect(presenter.kind).toBe('interactive-reply');
    expect(emit).toHaveBeenCalledWith(
      QUIZ_CONFIG.EVENTS.QUESTION,
      expect.objectContaining({ questionId: questions[0].id, index: 0 }),
    );
  });

  it('should render the summary when every question already has an answer', async () => {
    const presenter = new MessageBufferPresenter();
    const start = await flow.begin(presenter, USER, quizId);
    await store.upsertRecordedAnswer({
      attemptId: start.attempt.id,
      questionId: questions[0].id,
      answerId: null,
      isCorrect: false,
      isSkipped: true,
      answeredAt: 0,
    });
    await store.upsertRecordedAnswer({
      attemptId: start.attempt.id,
      questionId: questions[1].id,
      answerId: null,
      isCorrect: false,
      isSkipped: true,
      answeredAt: 0,
    });
    const warn = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);

    const resumed = await flow.begin(presenter, USER, quizId);

    expect(resumed.status).toBe('completed');
    expect(presenter.lastResult?.skippedCount).toBe(2);
    // Answers written behind the engine's back leave the counters stale
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should start over on restart', async () => {
    const presenter = new MessageBufferPresenter();
    const first = await flow.begin(presenter, USER, quizId);

    const second = await flow.begin(presenter, USER, quizId, { restart: true });

    expect(second.status).toBe('started');
    expect(second.attempt.id).not.toBe(first.attempt.id);
    expect((await store.getAttempt(first.attempt.id))?.abandoned).toBe(true);
  });

  it('should surface access errors before rendering anything', async () => {
    const presenter = new MessageBufferPresenter();

    await expect(
      flow.begin(presenter, 'stranger', quizId),
    ).rejects.toBeInstanceOf(AccessDeniedError);
    expect(presenter.messages).toEqual([]);
  });
});
