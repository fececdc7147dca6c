import { describe, it } from 'node:test';
import assert from 'node:assert';
import { firstPresent, maskPhoneNumber } from './phoneNumber.util';

describe('phoneNumber.util', () => {
  describe('maskPhoneNumber', () => {
    it('masks the last four digits', () => {
      assert.strictEqual(maskPhoneNumber('+12025551234'), '+1202555****');
    });

    it('fully masks short or missing values', () => {
      assert.strictEqual(maskPhoneNumber('123'), '****');
      assert.strictEqual(maskPhoneNumber(undefined), '****');
    });
  });

  describe('firstPresent', () => {
    it('returns the first non-empty string in order', () => {
      assert.strictEqual(firstPresent(undefined, '', '  ', '+1000', '+2000'), '+1000');
    });

    it('returns undefined when nothing is present', () => {
      assert.strictEqual(firstPresent(null, undefined, ''), undefined);
    });
  });
});
