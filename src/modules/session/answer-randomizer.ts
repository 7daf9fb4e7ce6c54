import { Inject, Injectable, Optional } from '@nestjs/common';
import { Answer, DisplayAnswer } from '../../common/interfaces/quiz.interface';
import { letterLabel } from '../../common/utils/letters';

export const RANDOM_SOURCE = 'RANDOM_SOURCE';

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

@Injectable()
export class AnswerRandomizer {
  private readonly random: RandomSource;

  constructor(@Optional() @Inject(RANDOM_SOURCE) random?: RandomSource) {
    this.random = random ?? Math.random;
  }

  /**
   * Fresh display order on every call. Labels follow display position, so a
   * label never identifies an answer; `answerId` does.
   */
  present(answers: Answer[]): DisplayAnswer[] {
    const shuffled = [...answers];

    // Fisher-Yates
    for (let i = shuffled.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }

    return shuffled.map((answer, index) => ({
      label: letterLabel(index),
      answerId: answer.id,
      text: answer.text,
    }));
  }
}
