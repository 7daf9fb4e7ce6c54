import { validateBlock } from './block.validator';
import {
  ParsedAnswer,
  ParsedQuestion,
} from '../../common/interfaces/parsed-quiz.interface';

const answer = (text: string, isCorrect = false): ParsedAnswer => ({
  text,
  isCorrect,
});

const question = (
  number: number,
  text: string,
  answers: ParsedAnswer[],
): ParsedQuestion => ({ number, text, answers });

describe('validateBlock', () => {
  it('should accept a block where every question has one correct answer', () => {
    const result = validateBlock({
      questions: [
        question(1, 'First?', [answer('a', true), answer('b')]),
        question(2, 'Second?', [answer('c'), answer('d', true), answer('e')]),
      ],
    });

    expect(result).toEqual({ ok: true });
  });

  it('should reject an empty block', () => {
    expect(validateBlock({ questions: [] })).toEqual({
      ok: false,
      reason: 'EmptyBlock',
      message: 'Block contains no questions',
    });
  });

  it('should reject a question without text', () => {
    const result = validateBlock({
      questions: [question(3, '  ', [answer('a', true), answer('b')])],
    });

    expect(result).toEqual({
      ok: false,
      reason: 'MissingQuestionText',
      questionNumber: 3,
      message: 'Question 3: text is missing',
    });
  });

  it('should reject a question with fewer than two answers', () => {
    const result = validateBlock({
      questions: [question(4, 'Alone?', [answer('only', true)])],
    });

    expect(result).toMatchObject({
      ok: false,
      reason: 'InsufficientAnswers',
      questionNumber: 4,
    });
  });

  it('should reject zero or several correct markers', () => {
    const none = validateBlock({
      questions: [question(5, 'None?', [answer('a'), answer('b')])],
    });
    const many = validateBlock({
      questions: [question(6, 'Many?', [answer('a', true), answer('b', true)])],
    });

    expect(none).toMatchObject({
      ok: false,
      reason: 'AmbiguousCorrectMarker',
      questionNumber: 5,
    });
    expect(many).toEqual({
      ok: false,
      reason: 'AmbiguousCorrectMarker',
      questionNumber: 6,
      message:
        'Question 6: exactly one answer must be marked correct (found 2)',
    });
  });

  it('should report the first failing check of the first failing question', () => {
    const result = validateBlock({
      questions: [
        question(1, 'Fine?', [answer('a', true), answer('b')]),
        question(2, '', [answer('x')]),
      ],
    });

    expect(result).toMatchObject({
      reason: 'MissingQuestionText',
      questionNumber: 2,
    });
  });
});
