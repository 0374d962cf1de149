/**
 * ChannelExpander Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  expandChannels,
  expandPolicy,
  countChannels,
  groupChannels,
  type ArchivePolicy,
  type Attribute,
  type DbRecord,
} from '@archconf/core';

function archive(policy: ArchivePolicy): Attribute {
  return { kind: 'info', name: 'archive', value: '', policy };
}

describe('expandPolicy()', () => {
  it('should emit one channel named after the record when there is no property list', () => {
    assert.deepStrictEqual(expandPolicy('BL7:Mot:Parker:HROT.RBV', { mode: 'monitor', period: '00:00:10', properties: null }), [
      { name: 'BL7:Mot:Parker:HROT.RBV', period: '00:00:10', mode: 'monitor' },
    ]);
  });

  it('should emit one channel per property', () => {
    assert.deepStrictEqual(
      expandPolicy('CF_BmLn:TT07108:T', {
        mode: 'scan',
        period: '00:01:00',
        properties: ['HIHI', 'LOLO', 'HIGH', 'LOW'],
      }),
      [
        { name: 'CF_BmLn:TT07108:T.HIHI', period: '00:01:00', mode: 'scan' },
        { name: 'CF_BmLn:TT07108:T.LOLO', period: '00:01:00', mode: 'scan' },
        { name: 'CF_BmLn:TT07108:T.HIGH', period: '00:01:00', mode: 'scan' },
        { name: 'CF_BmLn:TT07108:T.LOW', period: '00:01:00', mode: 'scan' },
      ]
    );
  });

  it('should emit nothing for an empty property list', () => {
    assert.deepStrictEqual(expandPolicy('R', { mode: 'scan', period: '00:00:01', properties: [] }), []);
  });
});

describe('countChannels()', () => {
  it('should count 1 without properties and one per property otherwise', () => {
    assert.strictEqual(countChannels({ mode: 'monitor', period: '00:00:05', properties: null }), 1);
    assert.strictEqual(countChannels({ mode: 'scan', period: '00:10:00', properties: ['HIHI', 'LOLO'] }), 2);
    assert.strictEqual(countChannels({ mode: 'scan', period: '00:10:00', properties: [] }), 0);
  });
});

describe('expandChannels()', () => {
  it('should ignore field attributes', () => {
    const records: DbRecord[] = [
      { type: 'ai', name: 'A', attributes: [{ kind: 'field', name: 'DESC', value: 'd' }] },
    ];
    assert.deepStrictEqual(expandChannels(records), []);
  });

  it('should flatten in record, attribute, property order', () => {
    const records: DbRecord[] = [
      {
        type: 'ai',
        name: 'A',
        attributes: [
          archive({ mode: 'scan', period: '00:10:00', properties: ['HIHI', 'LOLO'] }),
          { kind: 'field', name: 'DESC', value: 'd' },
          archive({ mode: 'monitor', period: '00:00:01', properties: null }),
        ],
      },
      {
        type: 'bo',
        name: 'B',
        attributes: [archive({ mode: 'monitor', period: '00:00:05', properties: null })],
      },
    ];

    assert.deepStrictEqual(
      expandChannels(records).map((c) => `${c.name} ${c.period} ${c.mode}`),
      ['A.HIHI 00:10:00 scan', 'A.LOLO 00:10:00 scan', 'A 00:00:01 monitor', 'B 00:00:05 monitor']
    );
  });

  it('should return an empty list for no records', () => {
    assert.deepStrictEqual(expandChannels([]), []);
  });
});

describe('groupChannels()', () => {
  it('should use Default_Group unless a name is given', () => {
    assert.strictEqual(groupChannels([]).name, 'Default_Group');
    assert.strictEqual(groupChannels([], 'Motors').name, 'Motors');
  });
});
