import {
  closeOpenBrackets,
  extractBalancedObject,
  removeTrailingCommas,
  repairJson,
  stripComments,
} from './json-repair.util';
import { ResponseUnparseableError } from '../domain/errors/document-analysis.errors';

describe('json repair', () => {
  describe('repairJson', () => {
    it('should parse clean JSON directly', () => {
      expect(repairJson('{"a": 1}')).toEqual({ a: 1 });
    });

    it('should take the fenced code block', () => {
      const raw = 'Here you go:\n```json\n{"a": 1}\n```\nThanks';
      expect(repairJson(raw)).toEqual({ a: 1 });
    });

    it('should extract the first balanced object from prose', () => {
      expect(repairJson('Result: {"a": {"b": "}"}} done')).toEqual({
        a: { b: '}' },
      });
    });

    it('should drop trailing commas', () => {
      expect(repairJson('{"a": [1, 2,], "b": 3,}')).toEqual({
        a: [1, 2],
        b: 3,
      });
    });

    it('should close a truncated object', () => {
      expect(repairJson('{"topics": [{"label": "AI"')).toEqual({
        topics: [{ label: 'AI' }],
      });
    });

    it('should strip comments outside strings', () => {
      expect(repairJson('{"a": 1, // note\n "b": "http://x"}')).toEqual({
        a: 1,
        b: 'http://x',
      });
    });

    it('should reject JSON that is not an object', () => {
      expect(() => repairJson('[1,2]')).toThrow(
        new ResponseUnparseableError(
          'Model response is JSON but not an object',
          '[1,2]',
        ),
      );
    });

    it('should reject prose with a truncated preview', () => {
      const raw = 'x'.repeat(600);

      let caught: unknown;
      try {
        repairJson(raw);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ResponseUnparseableError);
      expect(caught).toMatchObject({
        message: 'Model response could not be parsed as JSON',
        preview: `${'x'.repeat(500)}…`,
      });
    });
  });

  describe('helpers', () => {
    it('should return null when there is no object', () => {
      expect(extractBalancedObject('no braces here')).toBeNull();
    });

    it('should keep comment markers inside strings', () => {
      expect(stripComments('{"u": "a//b"} /* tail */')).toBe('{"u": "a//b"} ');
    });

    it('should keep commas inside strings', () => {
      expect(removeTrailingCommas('{"s": ",}",}')).toBe('{"s": ",}"}');
    });

    it('should close an open string before brackets', () => {
      expect(closeOpenBrackets('{"a": ["b')).toBe('{"a": ["b"]}');
    });
  });
});
