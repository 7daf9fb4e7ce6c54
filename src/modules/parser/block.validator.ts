import {
  BlockValidation,
  ParsedBlock,
} from '../../common/interfaces/parsed-quiz.interface';

export function validateBlock(block: ParsedBlock): BlockValidation {
  if (block.questions.length === 0) {
    return {
      ok: false,
      reason: 'EmptyBlock',
      message: 'Block contains no questions',
    };
  }

  for (const question of block.questions) {
    if (!question.text.trim()) {
      return {
        ok: false,
        reason: 'MissingQuestionText',
        questionNumber: question.number,
        message: `Question ${question.number}: text is missing`,
      };
    }

    if (question.answers.length < 2) {
      return {
        ok: false,
        reason: 'InsufficientAnswers',
        questionNumber: question.number,
        message: `Question ${question.number}: at least 2 answers are required`,
      };
    }

    const correctCount = question.answers.filter((a) => a.isCorrect).length;
    if (correctCount !== 1) {
      return {
        ok: false,
        reason: 'AmbiguousCorrectMarker',
        questionNumber: question.number,
        message: `Question ${question.number}: exactly one answer must be marked correct (found ${correctCount})`,
      };
    }
  }

  return { ok: true };
}
