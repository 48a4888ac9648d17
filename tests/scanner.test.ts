import { describe, it, expect } from 'vitest';
import { Scanner, describeKind } from '../src/scanner';

describe('scanner', () => {
  describe('names and integers', () => {
    it('skips leading whitespace', () => {
      expect(new Scanner('  abc').scan(0, 'name')).toEqual({ kind: 'name', text: 'abc', start: 2, end: 5 });
    });

    it('stops a name at punctuation', () => {
      expect(new Scanner('rs1:A_b)').scan(0, 'name')).toEqual({ kind: 'name', text: 'rs1:A_b', start: 0, end: 7 });
    });

    it('matches only digits as an integer', () => {
      expect(new Scanner('12x').scan(0, 'integer')).toEqual({ kind: 'integer', text: '12', start: 0, end: 2 });
      expect(new Scanner('x1').scan(0, 'integer')).toBeNull();
    });
  });

  describe('literals', () => {
    it('does not let a word literal run into a name', () => {
      expect(new Scanner('SNPs1').scan(0, 'SNPs')).toBeNull();
      expect(new Scanner('ask').scan(0, 'as')).toBeNull();
    });

    it('matches a word literal before punctuation', () => {
      expect(new Scanner('SNPs+x').scan(0, 'SNPs')).toEqual({ kind: 'SNPs', text: 'SNPs', start: 0, end: 4 });
    });

    it('matches call openers without a guard', () => {
      expect(new Scanner('g(x)').scan(0, 'g(')).toEqual({ kind: 'g(', text: 'g(', start: 0, end: 2 });
    });

    it('does not allow whitespace inside a call opener', () => {
      expect(new Scanner('g (x)').scan(0, 'g(')).toBeNull();
    });
  });

  describe('end of input', () => {
    it('matches after trailing whitespace', () => {
      expect(new Scanner('x  ').scan(1, 'eof')).toEqual({ kind: 'eof', text: '', start: 3, end: 3 });
    });

    it('does not match before remaining text', () => {
      expect(new Scanner('x ').scan(0, 'eof')).toBeNull();
    });
  });

  describe('peeking', () => {
    it('returns the same token for repeated scans', () => {
      const scanner = new Scanner('y ~ x');
      expect(scanner.scan(1, '~')).toEqual(scanner.scan(1, '~'));
    });
  });

  describe('descriptions', () => {
    it('describes the text at an offset', () => {
      const scanner = new Scanner('y ~ x1');
      expect(scanner.describeAt(1)).toBe("'~'");
      expect(scanner.describeAt(3)).toBe("'x1'");
      expect(scanner.describeAt(6)).toBe('end of input');
    });

    it('describes token kinds', () => {
      expect(describeKind('+')).toBe("'+'");
      expect(describeKind('name')).toBe('name');
      expect(describeKind('eof')).toBe('end of input');
    });
  });
});
