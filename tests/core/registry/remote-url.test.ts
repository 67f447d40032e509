import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { isRemoteUrl, repositoryNameFromUrl } from '../../../packages/core/src/core/registry/remote-url.js';
import { ValidationError } from '../../../packages/core/src/utils/errors.js';

describe('isRemoteUrl', () => {
  it('accepts URLs git can clone from', () => {
    assert.equal(isRemoteUrl('https://example.com/team/lib.git'), true);
    assert.equal(isRemoteUrl('ssh://git@example.com/team/lib.git'), true);
    assert.equal(isRemoteUrl('file:///srv/repos/lib.git'), true);
    assert.equal(isRemoteUrl('git@example.com:team/lib.git'), true);
  });

  it('rejects local paths, bare hosts and other schemes', () => {
    assert.equal(isRemoteUrl('lib'), false);
    assert.equal(isRemoteUrl('/srv/repos/lib'), false);
    assert.equal(isRemoteUrl('https://example.com'), false);
    assert.equal(isRemoteUrl('ftp://example.com/lib.git'), false);
  });
});

describe('repositoryNameFromUrl', () => {
  it('takes the last path segment without .git', () => {
    assert.equal(repositoryNameFromUrl('https://example.com/team/lib.git'), 'lib');
    assert.equal(repositoryNameFromUrl('git@example.com:team/lib.git'), 'lib');
    assert.equal(repositoryNameFromUrl('https://example.com/team/lib/'), 'lib');
    assert.equal(repositoryNameFromUrl('file:///srv/repos/tools'), 'tools');
  });

  it('rejects input it cannot name', () => {
    assert.throws(() => repositoryNameFromUrl('not a url'), ValidationError);
    assert.throws(() => repositoryNameFromUrl('https://example.com/'), ValidationError);
  });
});
