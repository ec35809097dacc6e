import { describe, it, expect } from 'vitest';
import { Runtime, type FunctionConfig } from '../../src/core/types.js';
import {
  failingArtifactLoader,
  fakeArtifactLoader,
  fakeTypeResolver,
  validateOffline,
} from '../../src/testing/index.js';

const config: FunctionConfig = {
  tenant: 't',
  namespace: 'ns',
  name: 'f',
  className: 'com.x.F',
  inputs: ['persistent://t/ns/in'],
};

describe('fakeArtifactLoader', () => {
  it('opens every locator with the given classes and records it', async () => {
    const loader = fakeArtifactLoader(['com.x.F']);
    const handle = await loader.load({ kind: 'file', path: '/fn/f.jar' });

    expect(handle.locator).toBe('/fn/f.jar');
    expect(handle.hasClass('com.x.F')).toBe(true);
    expect(loader.requests).toEqual([{ kind: 'file', path: '/fn/f.jar' }]);
  });
});

describe('failingArtifactLoader', () => {
  it('rejects with the given error', async () => {
    const error = new Error('offline');
    await expect(failingArtifactLoader(error).load({ kind: 'url', url: 'http://example.invalid' })).rejects.toBe(
      error,
    );
  });
});

describe('fakeTypeResolver', () => {
  it('returns the canned types', async () => {
    const loader = fakeArtifactLoader();
    const handle = await loader.load({ kind: 'file', path: '/fn/f.jar' });
    const types = { input: 'java.lang.Long', output: 'java.lang.Void' };

    await expect(fakeTypeResolver(types).resolve(config, handle)).resolves.toEqual(types);
  });
});

describe('validateOffline', () => {
  it('defaults to String types', async () => {
    const result = await validateOffline(config, { packageUrl: 'http://example.invalid/f.jar' });
    expect(result.types).toEqual({ input: 'java.lang.String', output: 'java.lang.String' });
  });

  it('treats only the listed files as present', async () => {
    const python: FunctionConfig = { ...config, runtime: Runtime.PYTHON, py: '/fn/f.py' };

    await expect(validateOffline(python)).rejects.toThrow('The supplied python file does not exist');
    await expect(validateOffline(python, { files: ['/fn/f.py'] })).resolves.toEqual({});
  });

  it('lets collaborators be replaced', async () => {
    await expect(
      validateOffline(config, {
        packageUrl: 'http://example.invalid/f.jar',
        collaborators: { isValidTopicName: () => false },
      }),
    ).rejects.toThrow('Input topic persistent://t/ns/in is invalid');
  });
});
