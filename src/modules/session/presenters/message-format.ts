import { AttemptResult } from '../../../common/interfaces/attempt.interface';
import {
  AnswerFeedback,
  QuestionView,
} from '../../../common/interfaces/session.interface';

const MAX_QUIZ_NAME = 60;

export function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes} min ${seconds} sec`;
}

export function formatQuestion(view: QuestionView): string {
  const lines = [`[${view.index + 1}/${view.total}]`, '', view.text, ''];

  for (const answer of view.answers) {
    let prefix = '';
    if (view.previous && view.previous.answerId === answer.answerId) {
      prefix = view.previous.category === 'correct' ? '✅ ' : '❌ ';
    }
    lines.push(`${prefix}${answer.label}. ${answer.text}`);
  }

  return lines.join('\n');
}

export function formatFeedback(feedback: AnswerFeedback): string {
  if (feedback.category === 'correct') return '✅ Correct!';

  const head = feedback.category === 'wrong' ? '❌ Wrong.' : '⏭ Skipped.';
  if (feedback.correctAnswerText === null) {
    return feedback.category === 'wrong'
      ? `${head} No correct answer found.`
      : head;
  }
  return `${head}\n\n✅ Correct answer: ${feedback.correctAnswerText}`;
}

export function formatSummary(result: AttemptResult): string {
  const name =
    result.quizName.length > MAX_QUIZ_NAME
      ? `${result.quizName.slice(0, MAX_QUIZ_NAME)}...`
      : result.quizName;
  const lines = [`"${name}" quiz`, ''];

  if (result.hasPreviousResults) {
    lines.push(
      'Your best result:',
      '',
      `✅ Correct: ${result.best.correct}`,
      `❌ Wrong: ${result.best.wrong}`,
      `⌛ Skipped: ${result.best.skipped}`,
      `⏱ ${formatDuration(result.best.durationSeconds)}`,
      '',
      'This attempt:',
      '',
    );
  } else {
    lines.push('Quiz completed!', '', 'Your result:', '');
  }

  lines.push(
    `✅ Correct: ${result.correctCount}`,
    `❌ Wrong: ${result.wrongCount}`,
    `⌛ Skipped: ${result.skippedCount}`,
    `⏱ ${formatDuration(result.durationSeconds)}`,
  );

  const { ranking } = result;
  if (ranking.totalParticipants > 1) {
    lines.push(
      '',
      `Place ${ranking.position} of ${ranking.totalParticipants}. ` +
        `You scored at least as high as ${ranking.percentile.toFixed(0)}% of participants.`,
    );
  }

  return lines.join('\n');
}
