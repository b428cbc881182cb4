/**
 * Primitive encoders shared by every codec
 */

import { test } from 'node:test';
import { strict as assert } from 'assert';
import {
  decodeBase16,
  decodeBase64,
  decodeBinaryText,
  decodeUtf8,
  encodeBase16,
  encodeBase64,
  encodeUtf8,
  formatDate,
  formatReal,
  nonFiniteWord,
  parseDate,
  parseInteger,
  parseReal,
  uuidFromText,
  uuidToText
} from '../src/codec/primitives.js';
import { LLSDErrorCode, LLSDErrorKind } from '../src/codec/errors.js';
import { bytes, expectLLSDError } from './harness.js';

const JAN_1_2006 = 1136073600;

test('uuid text is lowercase 8-4-4-4-12 hex', () => {
  const raw = uuidFromText('6BAD258E-06F0-4C5D-9C86-4A4D6E0B7B93');
  assert.equal(raw.length, 16);
  assert.equal(raw[0], 0x6b);
  assert.equal(uuidToText(raw), '6bad258e-06f0-4c5d-9c86-4a4d6e0b7b93');
  assert.equal(uuidToText(new Uint8Array(16)), '00000000-0000-0000-0000-000000000000');
  expectLLSDError(() => uuidFromText('6bad258e06f04c5d9c864a4d6e0b7b93'), LLSDErrorCode.InvalidUuid, LLSDErrorKind.InvalidPrimitive);
  expectLLSDError(() => uuidFromText('6bad258e-06f0-4c5d-9c86-4a4d6e0b7b9g'), LLSDErrorCode.InvalidUuid);
});

test('dates format as UTC seconds without a fraction', () => {
  assert.equal(formatDate(0), '1970-01-01T00:00:00Z');
  assert.equal(formatDate(-1), '1969-12-31T23:59:59Z');
  assert.equal(formatDate(JAN_1_2006), '2006-01-01T00:00:00Z');
  expectLLSDError(() => formatDate(1e13), LLSDErrorCode.InvalidDate);
});

test('date parsing truncates fractions and applies offsets', () => {
  assert.equal(parseDate('2006-01-01T00:00:00Z'), JAN_1_2006);
  assert.equal(parseDate('2006-01-01T00:00:00.999Z'), JAN_1_2006);
  assert.equal(parseDate('2006-01-01T01:30:00+01:30'), JAN_1_2006);
  assert.equal(parseDate('2005-12-31T19:00:00-05:00'), JAN_1_2006);
  assert.equal(parseDate('1969-12-31T23:59:59.5Z'), -1);
  expectLLSDError(() => parseDate('2006-02-30T00:00:00Z'), LLSDErrorCode.InvalidDate);
  expectLLSDError(() => parseDate('2006-01-01 00:00:00'), LLSDErrorCode.InvalidDate);
  expectLLSDError(() => parseDate('2006-01-01T24:00:00Z'), LLSDErrorCode.InvalidDate);
});

test('base64 and base16 text', () => {
  assert.equal(encodeBase64(bytes(0x48, 0x69)), 'SGk=');
  assert.deepEqual(Array.from(decodeBase64('SG k=\n')), [0x48, 0x69]);
  assert.deepEqual(Array.from(decodeBase64('')), []);
  expectLLSDError(() => decodeBase64('SGk'), LLSDErrorCode.InvalidBinary);
  expectLLSDError(() => decodeBase64('S*k='), LLSDErrorCode.InvalidBinary);

  assert.equal(encodeBase16(bytes(0x0f, 0xa1)), '0fa1');
  assert.deepEqual(Array.from(decodeBase16('0FA1')), [0x0f, 0xa1]);
  expectLLSDError(() => decodeBase16('0fa'), LLSDErrorCode.InvalidBinary);
});

test('binary text dispatches on its encoding name', () => {
  assert.deepEqual(Array.from(decodeBinaryText('0fa1', 'base16')), [0x0f, 0xa1]);
  assert.deepEqual(Array.from(decodeBinaryText('0fa1', 'hex')), [0x0f, 0xa1]);
  assert.deepEqual(Array.from(decodeBinaryText('SGk=', 'BASE64')), [0x48, 0x69]);
  expectLLSDError(() => decodeBinaryText('abc', 'base85'), LLSDErrorCode.UnsupportedForm, LLSDErrorKind.UnsupportedValue);
  expectLLSDError(() => decodeBinaryText('abc', 'rot13'), LLSDErrorCode.InvalidBinary);
});

test('utf-8 conversion is strict', () => {
  assert.equal(decodeUtf8(encodeUtf8('héllo \u{1f600}')), 'héllo \u{1f600}');
  expectLLSDError(() => decodeUtf8(bytes(0xff)), LLSDErrorCode.InvalidString, LLSDErrorKind.InvalidPrimitive);
  expectLLSDError(() => encodeUtf8('\ud800'), LLSDErrorCode.UnrepresentableText, LLSDErrorKind.UnsupportedValue);
});

test('integers never wrap', () => {
  assert.equal(parseInteger('-2147483648'), -2147483648);
  assert.equal(parseInteger('+17'), 17);
  assert.ok(Object.is(parseInteger('-0'), 0));
  expectLLSDError(() => parseInteger('2147483648'), LLSDErrorCode.InvalidInteger);
  expectLLSDError(() => parseInteger('12a'), LLSDErrorCode.InvalidInteger);
  expectLLSDError(() => parseInteger(''), LLSDErrorCode.InvalidInteger);
});

test('reals parse decimal text and optionally non-finite words', () => {
  assert.equal(parseReal('1e3', false), 1000);
  assert.equal(parseReal('-.5', false), -0.5);
  assert.ok(Number.isNaN(parseReal('nan', true)));
  assert.equal(parseReal('-Infinity', true), -Infinity);
  expectLLSDError(() => parseReal('inf', false), LLSDErrorCode.NonFiniteReal, LLSDErrorKind.UnsupportedValue);
  expectLLSDError(() => parseReal('1.5.2', true), LLSDErrorCode.InvalidReal, LLSDErrorKind.InvalidPrimitive);

  assert.equal(formatReal(-0), '-0');
  assert.equal(formatReal(0.1), '0.1');
  assert.equal(formatReal(1e21), '1e+21');
  assert.equal(nonFiniteWord(NaN), 'nan');
  assert.equal(nonFiniteWord(-Infinity), '-inf');
});
