import {
  formatDuration,
  formatFeedback,
  formatQuestion,
  formatSummary,
} from './message-format';
import { AttemptResult } from '../../../common/interfaces/attempt.interface';
import { QuestionView } from '../../../common/interfaces/session.interface';

const view: QuestionView = {
  attemptId: 'attempt-1',
  quizId: 'quiz-1',
  questionId: 'question-1',
  questionNumber: 7,
  index: 2,
  total: 10,
  text: 'Capital of France?',
  answers: [
    { label: 'A', answerId: 'x', text: 'Paris' },
    { label: 'B', answerId: 'y', text: 'Rome' },
  ],
  previous: null,
};

const result: AttemptResult = {
  attemptId: 'attempt-1',
  quizId: 'quiz-1',
  quizName: 'Geography',
  totalQuestions: 10,
  correctCount: 6,
  wrongCount: 3,
  skippedCount: 1,
  durationSeconds: 125,
  best: { correct: 8, wrong: 2, skipped: 0, durationSeconds: 61 },
  hasPreviousResults: true,
  ranking: {
    position: 2,
    betterCount: 1,
    totalParticipants: 4,
    percentile: 75,
  },
};

describe('message-format', () => {
  it('should format durations in minutes and seconds', () => {
    expect(formatDuration(125)).toBe('2 min 5 sec');
    expect(formatDuration(0)).toBe('0 min 0 sec');
  });

  it('should number the question and label its answers', () => {
    expect(formatQuestion(view)).toBe(
      '[3/10]\n\nCapital of France?\n\nA. Paris\nB. Rome',
    );
  });

  it('should mark the earlier choice', () => {
    const answered = {
      ...view,
      previous: { answerId: 'y', category: 'wrong' as const },
    };

    expect(formatQuestion(answered)).toBe(
      '[3/10]\n\nCapital of France?\n\nA. Paris\n❌ B. Rome',
    );
  });

  it('should show the correct answer after a wrong answer or a skip', () => {
    const base = {
      attemptId: 'attempt-1',
      questionId: 'question-1',
      correctAnswerText: 'Paris',
      counters: { correctCount: 0, wrongCount: 1, skippedCount: 0 },
    };

    expect(formatFeedback({ ...base, category: 'correct' })).toBe(
      '✅ Correct!',
    );
    expect(formatFeedback({ ...base, category: 'wrong' })).toBe(
      '❌ Wrong.\n\n✅ Correct answer: Paris',
    );
    expect(formatFeedback({ ...base, category: 'skipped' })).toBe(
      '⏭ Skipped.\n\n✅ Correct answer: Paris',
    );
    expect(
      formatFeedback({ ...base, category: 'wrong', correctAnswerText: null }),
    ).toBe('❌ Wrong. No correct answer found.');
  });

  it('should include the best result and the placement line', () => {
    expect(formatSummary(result)).toBe(
      [
        '"Geography" quiz',
        '',
        'Your best result:',
        '',
        '✅ Correct: 8',
        '❌ Wrong: 2',
        '⌛ Skipped: 0',
        '⏱ 1 min 1 sec',
        '',
        'This attempt:',
        '',
        '✅ Correct: 6',
        '❌ Wrong: 3',
        '⌛ Skipped: 1',
        '⏱ 2 min 5 sec',
        '',
        'Place 2 of 4. You scored at least as high as 75% of participants.',
      ].join('\n'),
    );
  });

  it('should keep a first completion short', () => {
    const first: AttemptResult = {
      ...result,
      quizName: 'x'.repeat(70),
      hasPreviousResults: false,
      ranking: {
        position: 1,
        betterCount: 0,
        totalParticipants: 1,
        percentile: 100,
      },
    };

    expect(formatSummary(first).split('\n').slice(0, 4)).toEqual([
      `"${'x'.repeat(60)}..." quiz`,
      '',
      'Quiz completed!',
      '',
    ]);
    expect(formatSummary(first)).not.toContain('Place');
  });
});
