import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { bindObjectType, synthesize, HandlerSpecBuilder, SystemSpecBuilder } from '@handlerkit/core';
import {
  formatBindingSummary,
  formatParams,
  formatSummary,
  isOutputFormat,
} from '../src/utils/formatDeclarations.js';
import { parseHandlerList } from '../src/commands/bind.js';

const clock = synthesize(
  new SystemSpecBuilder('Clock')
    .addRequirement('Debug')
    .addHandler(
      new HandlerSpecBuilder('Updatable')
        .fn('tick', 'update', [{ name: 'dt', type: 'number' }])
        .fn('reset')
    )
    .build()
);

describe('formatDeclarations utilities', () => {
  describe('formatParams', () => {
    it('should render name: type pairs', () => {
      assert.strictEqual(
        formatParams([{ name: 'dt', type: 'number' }, { name: 'label', type: 'string' }]),
        'dt: number, label: string'
      );
    });

    it('should render nothing for no params', () => {
      assert.strictEqual(formatParams([]), '');
    });
  });

  describe('formatSummary', () => {
    it('should outline every declaration', () => {
      assert.strictEqual(formatSummary(clock), [
        `System Clock (${clock.checksum})`,
        '',
        'Handler interfaces:',
        '  Updatable',
        '    update(dt: number)',
        '    reset()',
        '',
        'Capability interface ClockObject extends Debug',
        '  asUpdatable() -> Updatable (read)',
        '  asUpdatableMut() -> Updatable (write)',
        '',
        'Registry Clock',
        '  objects: ClockObject[]',
        '  updatableIdxs: number[]',
        '  create()',
        '  add()',
        '  iterate()',
        '  iterateMut()',
        '  tick(dt: number) -> Updatable.update via updatableIdxs',
        '  reset() -> Updatable.reset via updatableIdxs',
      ].join('\n'));
    });

    it('should mark a system without handlers', () => {
      const empty = synthesize(new SystemSpecBuilder('Empty').build());
      const lines = formatSummary(empty).split('\n');

      assert.deepStrictEqual(lines.slice(2, 6), [
        'Handler interfaces:',
        '  (none)',
        '',
        'Capability interface EmptyObject',
      ]);
    });
  });

  describe('formatBindingSummary', () => {
    it('should mark present and absent accessors', () => {
      const binding = bindObjectType(clock, 'Stopwatch', ['Updatable']);
      assert.strictEqual(
        formatBindingSummary(binding),
        'Stopwatch implements Updatable\n  + asUpdatable()\n  + asUpdatableMut()'
      );
    });

    it('should say when nothing is implemented', () => {
      const binding = bindObjectType(clock, 'Sundial', []);
      assert.strictEqual(
        formatBindingSummary(binding),
        'Sundial implements (nothing)\n  - asUpdatable()\n  - asUpdatableMut()'
      );
    });
  });

  describe('isOutputFormat', () => {
    it('should accept summary and json only', () => {
      assert.strictEqual(isOutputFormat('summary'), true);
      assert.strictEqual(isOutputFormat('json'), true);
      assert.strictEqual(isOutputFormat('yaml'), false);
    });
  });

  describe('parseHandlerList', () => {
    it('should split, trim and drop empty entries', () => {
      assert.deepStrictEqual(parseHandlerList(' Drawable, Updatable ,,'), ['Drawable', 'Updatable']);
      assert.deepStrictEqual(parseHandlerList(''), []);
    });
  });
});
