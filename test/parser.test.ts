import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { ArgParser, UnsupportedKindError, createParser, defaultConversions } from '../src/index.js';
import type { ConversionEntry, ConversionRegistry, ValueKinds } from '../src/index.js';

describe('ArgParser.parse', () => {
  it('converts the token after a found flag', () => {
    const clp = createParser(['prog', '-img', 'photo.png', '-poly']);
    assert.equal(clp.parse('string', '-img', 'default', 'Image'), 'photo.png');
    assert.equal(clp.parse('bool', '-poly', false, 'Use interpolation'), true);
  });

  it('returns the default when the flag is absent and records it', () => {
    const clp = createParser(['prog']);
    assert.equal(clp.parse('int', '-n', 5, 'count'), 5);
    assert.deepEqual(clp.options, [{ name: '-n', details: 'count', defaultValueText: '5' }]);
  });

  it('returns true for a bool flag given as the last argument', () => {
    const clp = createParser(['prog', '-v']);
    assert.equal(clp.parse('bool', '-v', false, 'verbose'), true);
  });

  it('treats a trailing non-bool flag as absent', () => {
    const clp = createParser(['prog', '-n']);
    assert.equal(clp.parse('int', '-n', 7, 'count'), 7);
  });

  it('ignores the token a bool flag is followed by', () => {
    const clp = createParser(['prog', '-poly', 'false']);
    assert.equal(clp.parse('bool', '-poly', false), true);
  });

  it('returns the default of an absent bool flag unchanged', () => {
    const clp = createParser(['prog']);
    assert.equal(clp.parse('bool', '-q', true, 'quiet'), true);
    assert.equal(clp.options[0].defaultValueText, '1');
  });

  it('never matches the invocation path', () => {
    const clp = createParser(['-n', '3']);
    assert.equal(clp.parse('int', '-n', 9), 9);
  });

  it('stops at the first occurrence of a flag', () => {
    const clp = createParser(['prog', '-n', '1', '-n', '2']);
    assert.equal(clp.parse('int', '-n'), 1);
  });

  it('uses the kind default and a blank help text when omitted', () => {
    const clp = createParser(['prog']);
    assert.equal(clp.parse('int', '-x'), 0);
    assert.equal(clp.parse('string', '-s'), '');
    assert.deepEqual(clp.options, [
      { name: '-x', details: ' ', defaultValueText: '0' },
      { name: '-s', details: ' ', defaultValueText: '' },
    ]);
  });

  it('degrades malformed numbers instead of failing', () => {
    const clp = createParser(['prog', '-n', 'abc', '-scale', '2.5e1']);
    assert.equal(clp.parse('int', '-n', 4), 0);
    assert.equal(clp.parse('float', '-scale', 1), 25);
  });

  it('records every call, including repeated names', () => {
    const clp = createParser(['prog', '-n', '2']);
    clp.parse('int', '-n', 1, 'first');
    clp.parse('int', '-n', 3, 'second');
    assert.deepEqual(clp.options, [
      { name: '-n', details: 'first', defaultValueText: '1' },
      { name: '-n', details: 'second', defaultValueText: '3' },
    ]);
  });

  it('records float defaults in %g form', () => {
    const clp = createParser(['prog']);
    clp.parse('float', '-eps', 0.00001, 'tolerance');
    assert.equal(clp.options[0].defaultValueText, '1e-05');
  });
});

describe('ArgParser.reset', () => {
  it('replaces the arguments and clears the history', () => {
    const clp = createParser(['prog', '-n', '1']);
    clp.parse('int', '-n');
    clp.reset(['other', '-n', '8']);
    assert.deepEqual(clp.options, []);
    assert.deepEqual(clp.args, ['other', '-n', '8']);
    assert.equal(clp.parse('int', '-n'), 8);
  });
});

describe('custom registries', () => {
  interface GeoKinds extends ValueKinds {
    point: { x: number; y: number };
    list: string[];
  }

  const point: ConversionEntry<{ x: number; y: number }> = {
    defaultValue: { x: 0, y: 0 },
    convert: (token) => {
      const [x = '0', y = '0'] = token.split(',');
      return { x: Number(x), y: Number(y) };
    },
    format: (p) => `${p.x},${p.y}`,
  };

  const list: ConversionEntry<string[]> = {
    defaultValue: [],
    convert: (token) => token.split(','),
  };

  const registry: ConversionRegistry<GeoKinds> = { ...defaultConversions, point, list };

  it('converts custom kinds next to the built-in ones', () => {
    const clp = createParser(['prog', '-at', '3,4', '-tags', 'a,b', '-n', '2'], registry);
    assert.deepEqual(clp.parse('point', '-at'), { x: 3, y: 4 });
    assert.deepEqual(clp.parse('list', '-tags'), ['a', 'b']);
    assert.equal(clp.parse('int', '-n'), 2);
  });

  it('records custom defaults with the entry formatter or String()', () => {
    const clp = new ArgParser(['prog'], registry);
    clp.parse('point', '-at', { x: 1, y: 2 }, 'origin');
    clp.parse('list', '-tags', ['x', 'y'], 'tags');
    assert.deepEqual(clp.options, [
      { name: '-at', details: 'origin', defaultValueText: '1,2' },
      { name: '-tags', details: 'tags', defaultValueText: 'x,y' },
    ]);
  });

  it('rejects a kind missing from an open-ended registry', () => {
    const loose: ConversionRegistry<Record<string, number>> = { num: defaultConversions.int };
    const clp = createParser(['prog', '-n', '1'], loose);
    assert.equal(clp.parse('num', '-n'), 1);
    assert.throws(() => clp.parse('other', '-n'), UnsupportedKindError);
    assert.equal(clp.options.length, 1);
  });
});
