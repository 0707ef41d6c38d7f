import { NotFoundException } from '@nestjs/common';
import { MAX_ROW_ID, ParseIdPipe } from './params';

describe('ParseIdPipe', () => {
  const pipe = new ParseIdPipe();

  it('parses ids in the integer column range', () => {
    expect(pipe.transform('1')).toBe(1);
    expect(pipe.transform('42')).toBe(42);
    expect(pipe.transform('2147483647')).toBe(MAX_ROW_ID);
  });

  it.each(['0', '2147483648', '99999999999', 'abc', '1.5', '-3', ''])('404s on %p', (raw) => {
    expect(() => pipe.transform(raw)).toThrow(NotFoundException);
  });
});
