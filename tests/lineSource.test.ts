import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { LineSource } from '../src/parsers/lineSource';
import { createFixtureDir, type FixtureDir } from './helpers';

describe('LineSource', () => {
  let fixtures: FixtureDir;

  beforeAll(() => {
    fixtures = createFixtureDir();
  });

  afterAll(() => {
    fixtures.cleanup();
  });

  it('should read lines without their terminators', () => {
    const source = new LineSource(fixtures.write('plain.csv', 'a,b\n1,2\r\n3,4\n'));

    expect(source.readLine()).toBe('a,b');
    expect(source.readLine()).toBe('1,2');
    expect(source.readLine()).toBe('3,4');
    expect(source.ended).toBe(false);
    expect(source.readLine()).toBeNull();
    expect(source.ended).toBe(true);
    source.close();
  });

  it('should mark the end when the last line has no newline', () => {
    const source = new LineSource(fixtures.write('unterminated.csv', 'a\nlast'));

    expect(source.readLine()).toBe('a');
    expect(source.ended).toBe(false);
    expect(source.readLine()).toBe('last');
    expect(source.ended).toBe(true);
    source.close();
  });

  it('should return to a remembered position', () => {
    const source = new LineSource(fixtures.write('seek.csv', 'one\ntwo\nthree\n'));

    source.readLine();
    const position = source.tell();
    expect(source.readLine()).toBe('two');
    expect(source.readLine()).toBe('three');
    expect(source.readLine()).toBeNull();

    source.seek(position);
    expect(source.ended).toBe(false);
    expect(source.readLine()).toBe('two');

    source.rewind();
    expect(source.readLine()).toBe('one');
    source.close();
  });

  it('should read lines longer than one chunk', () => {
    const long = 'x'.repeat(70000);
    const source = new LineSource(fixtures.write('long.csv', `${long}\nshort\n`));

    expect(source.readLine()).toBe(long);
    expect(source.readLine()).toBe('short');
    source.close();
  });

  it('should decode multi-byte characters', () => {
    const source = new LineSource(fixtures.write('utf8.csv', 'café,naïve\n'));

    expect(source.readLine()).toBe('café,naïve');
    source.close();
  });

  it('should refuse to read after close', () => {
    const source = new LineSource(fixtures.write('closed.csv', 'a\n'));
    source.close();

    expect(source.closed).toBe(true);
    expect(() => source.readLine()).toThrow('closed');
    source.close();
  });
});
