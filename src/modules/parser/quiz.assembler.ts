import {
  ParsedBlock,
  ParsedQuestion,
  QuizDraft,
  RejectedBlock,
} from '../../common/interfaces/parsed-quiz.interface';
import { NoValidQuestionsFoundError } from '../../common/errors/quiz.errors';
import { letterLabel } from '../../common/utils/letters';
import { validateBlock } from './block.validator';

/**
 * Merges the questions of every valid block into one ordered set.
 * Invalid blocks are dropped whole and reported in `rejectedBlocks`.
 */
export function assembleQuiz(blocks: ParsedBlock[], name: string): QuizDraft {
  const accepted: ParsedQuestion[] = [];
  const rejectedBlocks: RejectedBlock[] = [];

  blocks.forEach((block, blockIndex) => {
    const result = validateBlock(block);
    if (result.ok) {
      accepted.push(...block.questions);
      return;
    }
    rejectedBlocks.push({
      blockIndex,
      reason: result.reason,
      questionNumber: result.questionNumber,
      message: result.message,
    });
  });

  if (accepted.length === 0) {
    throw new NoValidQuestionsFoundError(rejectedBlocks);
  }

  // Array#sort is stable: equal numbers keep block-then-local order
  const ordered = [...accepted].sort((a, b) => a.number - b.number);

  return {
    name,
    rejectedBlocks,
    questions: ordered.map((question, index) => ({
      number: question.number,
      position: index + 1,
      text: question.text,
      answers: question.answers.map((answer, answerIndex) => ({
        text: answer.text,
        isCorrect: answer.isCorrect,
        letter: letterLabel(answerIndex),
      })),
    })),
  };
}
