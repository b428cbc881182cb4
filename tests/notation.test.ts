/**
 * Notation codec, byte-stream variant
 */

import { test } from 'node:test';
import { strict as assert } from 'assert';
import { LLSD_NOTATION_HEADER, notationCodec, parseNotation, serializeNotation } from '../src/codec/notation.js';
import { LLSD, asArray, asMap, equals, unwrap } from '../src/value/index.js';
import { LLSDErrorCode, LLSDErrorKind } from '../src/codec/errors.js';
import { ascii, expectLLSDError, text } from './harness.js';

test('repeated map keys keep the last value', () => {
  const parsed = parseNotation("{'a':i1,'a':i2}");
  const map = unwrap(asMap(parsed));
  assert.equal(map.size, 1);
  assert.ok(equals(parsed, LLSD.record({ a: LLSD.integer(2) })));
});

test('every value form parses', () => {
  const doc = `[
    !, 1, 0, t, TRUE, false,
    i-5, r2.5e1, r-0,
    "dq", 'sq',
    l"http://example.com/",
    d"2006-01-01T00:00:00Z",
    b16"0fa1", b64"SGk=",
    u00000000-0000-0000-0000-000000000001
  ]`;
  const uuid = new Uint8Array(16);
  uuid[15] = 1;
  const expected = LLSD.array([
    LLSD.undef(),
    LLSD.boolean(true),
    LLSD.boolean(false),
    LLSD.boolean(true),
    LLSD.boolean(true),
    LLSD.boolean(false),
    LLSD.integer(-5),
    LLSD.real(25),
    LLSD.real(-0),
    LLSD.string('dq'),
    LLSD.string('sq'),
    LLSD.uri('http://example.com/'),
    LLSD.date(1136073600),
    LLSD.binary([0x0f, 0xa1]),
    LLSD.binary([0x48, 0x69]),
    LLSD.uuid(uuid)
  ]);
  assert.ok(equals(parseNotation(doc), expected));
});

test('maps tolerate whitespace around separators', () => {
  const parsed = parseNotation("{ 'a' : i1 ,\n\t'b' : [ ] }");
  assert.ok(equals(parsed, LLSD.record({ a: LLSD.integer(1), b: LLSD.array() })));
  assert.ok(equals(parseNotation('{}'), LLSD.map()));
});

test('commas between items are optional and may trail', () => {
  const expected = LLSD.array([LLSD.integer(1), LLSD.integer(2)]);
  assert.ok(equals(parseNotation('[i1 i2]'), expected));
  assert.ok(equals(parseNotation('[i1,i2,]'), expected));
  assert.ok(equals(parseNotation('[ i1\ni2 , ]'), expected));
  assert.ok(equals(parseNotation("{'a':i1 'b':i2,}"), LLSD.record({ a: LLSD.integer(1), b: LLSD.integer(2) })));
  const err = expectLLSDError(() => parseNotation('[i1,,i2]'), LLSDErrorCode.UnknownType);
  assert.equal(err.offset, 4);
  expectLLSDError(() => parseNotation('[,]'), LLSDErrorCode.UnknownType);
  expectLLSDError(() => parseNotation('[i1,'), LLSDErrorCode.UnterminatedStructure);
});

test('quoted string escapes', () => {
  const parsed = parseNotation(String.raw`'\a\b\f\n\r\t\v\\\'\"\x41\q'`);
  assert.ok(equals(parsed, LLSD.string('\x07\b\f\n\r\t\v\\\'"Aq')));
  assert.ok(equals(parseNotation(String.raw`'\xc3\xa9'`), LLSD.string('é')));
  expectLLSDError(() => parseNotation(String.raw`'\xe9'`), LLSDErrorCode.InvalidString);
  expectLLSDError(() => parseNotation(String.raw`'\xzz'`), LLSDErrorCode.InvalidString);
});

test('byte-counted strings and binary', () => {
  assert.ok(equals(parseNotation('s(3)"abc"'), LLSD.string('abc')));
  assert.ok(equals(parseNotation("{s(1)'k':i1}"), LLSD.record({ k: LLSD.integer(1) })));
  const raw = Uint8Array.from([...ascii('b(2)"'), 0x00, 0xff, 0x22]);
  assert.ok(equals(parseNotation(raw), LLSD.binary([0x00, 0xff])));

  expectLLSDError(() => parseNotation('s(5)"abc"'), LLSDErrorCode.UnterminatedStructure);
  expectLLSDError(() => parseNotation('s(3)"abcd"'), LLSDErrorCode.StructuralError);
  expectLLSDError(() => parseNotation('s3"abc"'), LLSDErrorCode.StructuralError);
});

test('serializer output forms', () => {
  const value = LLSD.record({
    n: LLSD.undef(),
    t: LLSD.boolean(true),
    i: LLSD.integer(42),
    r: LLSD.real(1.5),
    s: LLSD.string("it's"),
    l: LLSD.uri('a"b'),
    d: LLSD.date(0),
    a: LLSD.array([LLSD.boolean(false)])
  });
  assert.equal(
    text(serializeNotation(value)),
    String.raw`{'n':!,'t':T,'i':i42,'r':r1.5,'s':'it\'s','l':l"a\"b",'d':d"1970-01-01T00:00:00Z",'a':[F]}`
  );
  assert.ok(equals(parseNotation(serializeNotation(value)), value));
});

test('binary is written as a raw counted span unless asked otherwise', () => {
  const value = LLSD.binary([0x00, 0xff]);
  assert.deepEqual(Array.from(serializeNotation(value)), [...ascii('b(2)"'), 0x00, 0xff, 0x22]);
  assert.equal(text(serializeNotation(value, { binary: 'base64' })), 'b64"AP8="');
  assert.equal(text(serializeNotation(value, { binary: 'base16' })), 'b16"00ff"');
  assert.ok(equals(parseNotation(serializeNotation(value)), value));
});

test('counted strings option', () => {
  const out = serializeNotation(LLSD.string('é'), { countedStrings: true });
  assert.deepEqual(Array.from(out), [...ascii('s(2)"'), 0xc3, 0xa9, 0x22]);
  assert.ok(equals(parseNotation(out), LLSD.string('é')));
});

test('header is optional on output and skipped on input', () => {
  const out = serializeNotation(LLSD.integer(1), { header: true });
  assert.equal(text(out), `${LLSD_NOTATION_HEADER}i1`);
  assert.ok(equals(parseNotation(out), LLSD.integer(1)));
  expectLLSDError(() => parseNotation('<? llsd/binary ?>\n!'), LLSDErrorCode.BadHeader);
});

test('non-finite reals cannot be written or read', () => {
  expectLLSDError(() => serializeNotation(LLSD.real(Infinity)), LLSDErrorCode.NonFiniteReal, LLSDErrorKind.UnsupportedValue);
  expectLLSDError(() => serializeNotation(LLSD.array([LLSD.real(NaN)])), LLSDErrorCode.NonFiniteReal);
  expectLLSDError(() => parseNotation('rnan'), LLSDErrorCode.NonFiniteReal, LLSDErrorKind.UnsupportedValue);
  expectLLSDError(() => parseNotation('[r-inf]'), LLSDErrorCode.NonFiniteReal);
});

test('grammar errors', () => {
  expectLLSDError(() => parseNotation('[i1,i2'), LLSDErrorCode.UnterminatedStructure, LLSDErrorKind.MalformedStructure);
  expectLLSDError(() => parseNotation("'abc"), LLSDErrorCode.UnterminatedStructure);
  expectLLSDError(() => parseNotation("{'a' i1}"), LLSDErrorCode.StructuralError, LLSDErrorKind.MalformedStructure);
  expectLLSDError(() => parseNotation('{a:i1}'), LLSDErrorCode.StructuralError);
  expectLLSDError(() => parseNotation('i1 i2'), LLSDErrorCode.StructuralError);
  expectLLSDError(() => parseNotation(''), LLSDErrorCode.UnterminatedStructure);

  const err = expectLLSDError(() => parseNotation('[!,x]'), LLSDErrorCode.UnknownType, LLSDErrorKind.UnknownType);
  assert.equal(err.offset, 3);
});

test('primitive errors', () => {
  expectLLSDError(() => parseNotation('b85"abc"'), LLSDErrorCode.UnsupportedForm, LLSDErrorKind.UnsupportedValue);
  expectLLSDError(() => parseNotation('b64"@@"'), LLSDErrorCode.InvalidBinary);
  expectLLSDError(() => parseNotation('i99999999999'), LLSDErrorCode.InvalidInteger, LLSDErrorKind.InvalidPrimitive);
  expectLLSDError(() => parseNotation('u1234'), LLSDErrorCode.UnterminatedStructure);
  expectLLSDError(() => parseNotation('u00000000-0000-0000-0000-00000000000z'), LLSDErrorCode.InvalidUuid);
  expectLLSDError(() => parseNotation('tru'), LLSDErrorCode.InvalidBoolean);
  expectLLSDError(() => parseNotation('d"2006-13-01T00:00:00Z"'), LLSDErrorCode.InvalidDate);
});

test('depth limit', () => {
  assert.equal(unwrap(asArray(parseNotation('[[[]]]', { maxDepth: 3 }))).length, 1);
  expectLLSDError(() => parseNotation('[[[]]]', { maxDepth: 2 }), LLSDErrorCode.LimitExceeded);
});

test('serialization is deterministic', () => {
  const value = LLSD.record({ z: LLSD.integer(1), a: LLSD.binary([1, 2, 3]), m: LLSD.record({ y: LLSD.string('q') }) });
  assert.deepEqual(Array.from(serializeNotation(value)), Array.from(serializeNotation(value)));
  assert.equal(notationCodec.contentTypes[0], 'application/llsd+notation');
});
