import { PlainTextExtractor } from './text-extractor';
import {
  ExtractionError,
  UnsupportedFormatError,
} from '../../common/errors/quiz.errors';

describe('PlainTextExtractor', () => {
  const extractor = new PlainTextExtractor();

  it('should decode utf-8 text for plain formats', async () => {
    const content = Buffer.from('1. Savol?\n#Ha\nYo‘q', 'utf-8');

    await expect(extractor.extract(content, 'txt')).resolves.toBe(
      '1. Savol?\n#Ha\nYo‘q',
    );
    await expect(extractor.extract(content, '.MD')).resolves.toBe(
      '1. Savol?\n#Ha\nYo‘q',
    );
  });

  it('should refuse binary document formats', async () => {
    await expect(
      extractor.extract(Buffer.from('PK'), 'docx'),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('should fail on bytes that are not valid utf-8', async () => {
    await expect(
      extractor.extract(Buffer.from([0xff, 0xfe, 0xfd]), 'txt'),
    ).rejects.toBeInstanceOf(ExtractionError);
  });
});
