/**
 * Cross-format behaviour
 * - the same value survives every codec
 * - serialization is deterministic
 */

import { test } from 'node:test';
import { strict as assert } from 'assert';
import { BUILTIN_CODECS } from '../src/codec/registry.js';
import { parseXml, serializeXml } from '../src/codec/xml.js';
import { parseBinary, serializeBinary } from '../src/codec/binary.js';
import { parseNotation, serializeNotation } from '../src/codec/notation.js';
import { parseNotationString, serializeNotationString } from '../src/codec/notation-string.js';
import { LLSD, LLSDValue, asMap, equals, unwrap } from '../src/value/index.js';
import { LLSDErrorCode } from '../src/codec/errors.js';
import { expectLLSDError, text } from './harness.js';

const SAMPLE = LLSD.record({
  agent_id: LLSD.uuid('6bad258e-06f0-4c5d-9c86-4a4d6e0b7b93'),
  name: LLSD.string('Test Resident é'),
  age: LLSD.integer(-12),
  balance: LLSD.real(1024.25),
  online: LLSD.boolean(true),
  home: LLSD.uri('http://example.com/home?x=1&y=2'),
  born: LLSD.date(1136073600),
  texture: LLSD.binary([0, 1, 2, 254, 255]),
  nothing: LLSD.undef(),
  groups: LLSD.array([
    LLSD.record({ title: LLSD.string("it's \"quoted\"\n"), powers: LLSD.integer(2147483647) }),
    LLSD.array()
  ])
});

test('a value survives every format unchanged', () => {
  assert.ok(equals(parseXml(serializeXml(SAMPLE)), SAMPLE));
  assert.ok(equals(parseXml(serializeXml(SAMPLE, { pretty: true })), SAMPLE));
  assert.ok(equals(parseBinary(serializeBinary(SAMPLE)), SAMPLE));
  assert.ok(equals(parseNotation(serializeNotation(SAMPLE)), SAMPLE));
  assert.ok(equals(parseNotation(serializeNotation(SAMPLE, { binary: 'base16', countedStrings: true })), SAMPLE));
  assert.ok(equals(parseNotationString(serializeNotationString(SAMPLE)), SAMPLE));
});

test('values can be transcoded between formats', () => {
  const viaBinary = parseBinary(serializeBinary(parseXml(serializeXml(SAMPLE))));
  const viaNotation = parseNotationString(serializeNotationString(viaBinary));
  assert.ok(equals(viaNotation, SAMPLE));
});

test('non-finite reals travel through XML and binary only', () => {
  const values: LLSDValue[] = [LLSD.real(NaN), LLSD.real(Infinity), LLSD.real(-Infinity)];
  for (const v of values) {
    assert.ok(equals(parseXml(serializeXml(v)), v));
    assert.ok(equals(parseBinary(serializeBinary(v)), v));
    expectLLSDError(() => serializeNotation(v), LLSDErrorCode.NonFiniteReal);
    expectLLSDError(() => serializeNotationString(v), LLSDErrorCode.NonFiniteReal);
  }
});

test('every codec serializes deterministically', () => {
  for (const codec of BUILTIN_CODECS) {
    const first = codec.serialize(SAMPLE);
    assert.deepEqual(Array.from(codec.serialize(SAMPLE)), Array.from(first), codec.name);
    assert.ok(equals(codec.parse(first), SAMPLE), codec.name);
  }
});

test('repeated keys keep the last value in every format', () => {
  const expected = LLSD.record({ k: LLSD.integer(2) });
  assert.ok(equals(parseXml('<llsd><map><key>k</key><integer>1</integer><key>k</key><integer>2</integer></map></llsd>'), expected));
  assert.ok(equals(parseNotation("{'k':i1,'k':i2}"), expected));
  assert.ok(equals(parseNotationString("{'k':i1,'k':i2}"), expected));
  const wire = Uint8Array.from([0x7b, 0, 0, 0, 2, 0x6b, 0, 0, 0, 1, 0x6b, 0x69, 0, 0, 0, 1, 0x6b, 0, 0, 0, 1, 0x6b, 0x69, 0, 0, 0, 2, 0x7d]);
  assert.ok(equals(parseBinary(wire, { header: false }), expected));
});

test('a repeated key takes the position of its last occurrence', () => {
  const parsed = parseNotation("{'b':i1,'a':i2,'b':i3}");
  assert.deepEqual(Array.from(unwrap(asMap(parsed)).keys()), ['a', 'b']);
  assert.ok(equals(parsed, LLSD.record({ a: LLSD.integer(2), b: LLSD.integer(3) })));
  assert.equal(text(serializeNotation(parsed)), "{'a':i2,'b':i3}");
});
