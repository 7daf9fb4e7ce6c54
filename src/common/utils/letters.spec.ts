import { letterLabel } from './letters';

describe('letterLabel', () => {
  it('should count like spreadsheet columns', () => {
    expect([0, 1, 25, 26, 27, 51, 52].map(letterLabel)).toEqual([
      'A',
      'B',
      'Z',
      'AA',
      'AB',
      'AZ',
      'BA',
    ]);
  });
});
