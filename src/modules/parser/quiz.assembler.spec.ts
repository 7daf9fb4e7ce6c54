import { assembleQuiz } from './quiz.assembler';
import { parseQuizText } from './quiz-format.parser';
import { NoValidQuestionsFoundError } from '../../common/errors/quiz.errors';

describe('assembleQuiz', () => {
  it('should keep one correct answer per question for numbered input', () => {
    const text = [
      '1. First?',
      '#yes',
      'no',
      '2. Second?',
      'maybe',
      '*sure',
      'never',
      '3. Third?',
      'a) left',
      'b) #right',
    ].join('\n');

    const draft = assembleQuiz(parseQuizText(text), 'Numbered');

    expect(draft.questions).toHaveLength(3);
    for (const question of draft.questions) {
      expect(question.answers.filter((a) => a.isCorrect)).toHaveLength(1);
    }
    expect(draft.rejectedBlocks).toEqual([]);
  });

  it('should drop a block with two correct markers and keep the others', () => {
    const text = [
      '1. Good?',
      '#yes',
      'no',
      '++++',
      '1. Bad?',
      '#a1',
      '#a2',
      '++++',
      '2. Also good?',
      'x',
      '#y',
    ].join('\n');

    const draft = assembleQuiz(parseQuizText(text), 'Mixed');

    expect(draft.questions.map((q) => q.text)).toEqual([
      'Good?',
      'Also good?',
    ]);
    expect(draft.rejectedBlocks).toEqual([
      {
        blockIndex: 1,
        reason: 'AmbiguousCorrectMarker',
        questionNumber: 1,
        message:
          'Question 1: exactly one answer must be marked correct (found 2)',
      },
    ]);
  });

  it('should sort by number and assign positions in that order', () => {
    const text = [
      '3. Three?',
      '#a',
      'b',
      '++++',
      '1. One?',
      '#a',
      'b',
      '3. Three again?',
      'a',
      '#b',
    ].join('\n');

    const draft = assembleQuiz(parseQuizText(text), 'Sorted');

    expect(
      draft.questions.map((q) => [q.position, q.number, q.text]),
    ).toEqual([
      [1, 1, 'One?'],
      [2, 3, 'Three?'],
      [3, 3, 'Three again?'],
    ]);
  });

  it('should give answers origin letters in source order', () => {
    const draft = assembleQuiz(
      parseQuizText('1. Pick one\nfirst\n#second\nthird'),
      'Letters',
    );

    expect(draft.questions[0].answers).toEqual([
      { text: 'first', isCorrect: false, letter: 'A' },
      { text: 'second', isCorrect: true, letter: 'B' },
      { text: 'third', isCorrect: false, letter: 'C' },
    ]);
  });

  it('should fail when no block survives validation', () => {
    const blocks = parseQuizText('1. Lonely?\n#only');

    expect(() => assembleQuiz(blocks, 'Empty')).toThrow(
      NoValidQuestionsFoundError,
    );
  });
});
