import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ErrorCodes, LockvendorError } from '../../src/types/index.js';
import {
  CancelledError,
  handleError,
  SourceResolutionError,
  VendorPathConflictError
} from '../../src/utils/errors.js';

describe('error types', () => {
  it('carry a code and structured details', () => {
    const error = new SourceResolutionError('https://github.com/acme/tools', 'a1b2c3d', 'boom', { status: 500 });
    assert.ok(error instanceof LockvendorError);
    assert.equal(error.code, ErrorCodes.SOURCE_RESOLUTION_ERROR);
    assert.deepEqual(error.details, { repositoryUrl: 'https://github.com/acme/tools', commit: 'a1b2c3d', status: 500 });
  });

  it('name the conflicting claimants of a vendor path', () => {
    const error = new VendorPathConflictError('vendor/foo-1.0.0', 'a', 'b');
    assert.equal(error.message, "Vendor path 'vendor/foo-1.0.0' is claimed by both a and b");
    assert.equal(error.code, ErrorCodes.VENDOR_PATH_CONFLICT);
  });
});

describe('handleError', () => {
  it('turns errors into failed command results', () => {
    assert.deepEqual(handleError(new CancelledError()), { success: false, error: 'Operation cancelled' });
    assert.deepEqual(handleError(new Error('plain')), { success: false, error: 'plain' });
    assert.deepEqual(handleError(42), { success: false, error: 'An unknown error occurred' });
  });
});
