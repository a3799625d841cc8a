import { describe, expect, it } from 'vitest';
import { HwpxError, HwpxErrorCode, withErrorContext } from '../src/hwpx/errors.js';

describe('withErrorContext', () => {
  it('wraps plain errors with the given code and context', async () => {
    const failing = withErrorContext(
      async () => {
        throw new Error('disk full');
      },
      HwpxErrorCode.PACKAGE_FAILED,
      { path: 'out.hwpx' },
    );
    await expect(failing).rejects.toMatchObject({
      name: 'HwpxError',
      message: 'disk full',
      code: HwpxErrorCode.PACKAGE_FAILED,
      context: { path: 'out.hwpx' },
    });
  });

  it('passes HwpxErrors through unchanged', async () => {
    const original = new HwpxError('bad cell', HwpxErrorCode.TABLE_GRID_MISMATCH, { row: 1 });
    const failing = withErrorContext(async () => {
      throw original;
    }, HwpxErrorCode.PACKAGE_FAILED);
    await expect(failing).rejects.toBe(original);
  });

  it('returns the operation result', async () => {
    await expect(withErrorContext(async () => 42, HwpxErrorCode.PACKAGE_FAILED)).resolves.toBe(42);
  });
});

describe('HwpxError', () => {
  it('serializes to JSON with its code and context', () => {
    const error = new HwpxError('missing', HwpxErrorCode.DANGLING_REFERENCE, { id: 9 });
    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'HwpxError',
      message: 'missing',
      code: 'DANGLING_REFERENCE',
      context: { id: 9 },
    });
  });
});
