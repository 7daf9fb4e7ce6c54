import { QUIZ_CONFIG } from '../../common/constants/quiz.constants';
import { letterLabel } from '../../common/utils/letters';
import {
  ParsedAnswer,
  ParsedBlock,
  ParsedQuestion,
} from '../../common/interfaces/parsed-quiz.interface';

// "12. Text" but not "3.14 is pi"
const NUMBERED_QUESTION = /^(\d+)\.(?!\d)\s*(.+)$/;
const OPTION_LINE = /^([a-zA-Z])[.)]\s*(.+)$/;
const LEADING_VARIATION_SELECTOR = /^\uFE0F/;
const BOM = /^\uFEFF/;

// Longest first; sort is stable, so listed order breaks ties
const MARKERS_BY_LENGTH = [...QUIZ_CONFIG.CORRECT_MARKERS].sort(
  (a, b) => b.length - a.length,
);

export interface OptionLine extends ParsedAnswer {
  letter: string;
}

export function stripCorrectMarker(line: string): ParsedAnswer {
  const trimmed = line.trim();
  const marker = MARKERS_BY_LENGTH.find((m) => trimmed.startsWith(m));

  if (!marker) {
    return { text: trimmed, isCorrect: false };
  }

  return {
    text: trimmed
      .slice(marker.length)
      .replace(LEADING_VARIATION_SELECTOR, '')
      .trim(),
    isCorrect: true,
  };
}

/**
 * Matches `a) text` / `B. text`, with the correct marker allowed either
 * before the letter or before the text.
 */
export function matchOption(line: string): OptionLine | null {
  const outer = stripCorrectMarker(line);
  const match = OPTION_LINE.exec(outer.text);
  if (!match) return null;

  const inner = stripCorrectMarker(match[2]);
  return {
    letter: match[1].toLowerCase(),
    text: inner.text,
    isCorrect: outer.isCorrect || inner.isCorrect,
  };
}

export function isSeparator(line: string): boolean {
  return QUIZ_CONFIG.SEPARATOR_PREFIXES.some((p) => line.startsWith(p));
}

interface OpenQuestion {
  number: number | null;
  text: string;
  answers: ParsedAnswer[];
}

/**
 * Single pass over the lines of one block.
 *
 * In `answers` mode (after a numbered line or a separator) every plain line
 * is an answer of the open question. In `options` mode plain lines are held
 * back as the text of the next question, which opens when an option line or
 * a separator shows up.
 */
class BlockParser {
  private readonly collected: OpenQuestion[] = [];
  private current: OpenQuestion | null = null;
  private pending: string[] = [];
  private mode: 'options' | 'answers' = 'options';

  parse(lines: string[]): ParsedBlock {
    for (const line of lines) {
      this.consume(line);
    }
    this.flush();
    return { questions: this.assignNumbers() };
  }

  private consume(line: string): void {
    if (isSeparator(line)) {
      if (this.pending.length > 0) {
        this.open(
          null,
          this.pending.slice(-QUIZ_CONFIG.NARRATIVE_WINDOW).join(' '),
        );
      }
      this.mode = 'answers';
      return;
    }

    const numbered = NUMBERED_QUESTION.exec(line);
    if (numbered) {
      this.open(Number(numbered[1]), numbered[2].trim());
      this.mode = 'answers';
      return;
    }

    if (this.mode === 'answers' && this.current) {
      this.addAnswer(this.readAnswer(this.current, line));
      return;
    }

    const option = matchOption(line);
    if (option) {
      if (this.pending.length > 0) {
        this.open(null, this.pending.join(' '));
        this.mode = 'options';
      }
      this.addAnswer({ text: option.text, isCorrect: option.isCorrect });
      return;
    }

    this.pending.push(line);
  }

  // "J. K. Rowling" is an answer, not option J
  private readAnswer(question: OpenQuestion, line: string): ParsedAnswer {
    const option = matchOption(line);
    const expected = letterLabel(question.answers.length).toLowerCase();
    if (option && option.letter === expected) {
      return { text: option.text, isCorrect: option.isCorrect };
    }
    return stripCorrectMarker(line);
  }

  private open(number: number | null, text: string): void {
    this.flush();
    this.current = { number, text, answers: [] };
    this.pending = [];
  }

  private addAnswer(answer: ParsedAnswer): void {
    // Options before any question text are orphans
    if (!this.current || !answer.text) return;
    this.current.answers.push(answer);
  }

  private flush(): void {
    if (!this.current) return;
    this.collected.push(this.current);
    this.current = null;
  }

  /** Auto numbers never reuse a number given explicitly anywhere in the block. */
  private assignNumbers(): ParsedQuestion[] {
    const explicit = new Set<number>();
    for (const { number } of this.collected) {
      if (number !== null) explicit.add(number);
    }

    let nextAuto = 1;
    return this.collected.map(({ number, text, answers }) => {
      if (number !== null) return { number, text, answers };

      while (explicit.has(nextAuto)) nextAuto += 1;
      const auto = nextAuto;
      nextAuto += 1;
      return { number: auto, text, answers };
    });
  }
}

function toLines(section: string): string[] {
  return section
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Splits a document into quiz blocks and recovers questions from each.
 * Never throws; unrecognised fragments are dropped.
 */
export function parseQuizText(text: string): ParsedBlock[] {
  const normalized = text.replace(BOM, '');
  const sections = normalized.includes(QUIZ_CONFIG.BLOCK_MARKER)
    ? normalized.split(QUIZ_CONFIG.BLOCK_MARKER)
    : [normalized];

  return sections
    .map(toLines)
    .filter((lines) => lines.length > 0)
    .map((lines) => new BlockParser().parse(lines));
}
