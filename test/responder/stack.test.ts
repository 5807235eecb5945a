import { describe, expect, it } from '@jest/globals';
import { stackFrames } from '../../src/responder';

describe('stackFrames', () => {
  it('should return frames without the at prefix', () => {
    const stack = [
      'TypeError: Cannot read properties of undefined',
      '    at loadUser (/srv/app/users.js:12:9)',
      '    at async Promise.all (index 0)',
      '    at /srv/app/server.js:40:3',
    ].join('\n');

    expect(stackFrames({ message: 'x', stack })).toEqual([
      'loadUser (/srv/app/users.js:12:9)',
      'async Promise.all (index 0)',
      '/srv/app/server.js:40:3',
    ]);
  });

  it('should skip message lines of a multi-line error', () => {
    const stack = 'Error: first\nsecond line\n    at run (/srv/run.js:1:1)';
    expect(stackFrames({ stack })).toEqual(['run (/srv/run.js:1:1)']);
  });

  it('should not read an at line inside the message as a frame', () => {
    const stack = 'Error: first\n    at injected (evil.js:1:1)\n    at run (/srv/run.js:1:1)';

    expect(stackFrames({ message: 'first\n    at injected (evil.js:1:1)', stack })).toEqual(['run (/srv/run.js:1:1)']);
  });

  it('should skip the message lines of a real error', () => {
    const frames = stackFrames(new Error('first\n    at injected (evil.js:1:1)'));

    expect(frames).not.toContain('injected (evil.js:1:1)');
    expect(frames[0]).toContain('stack.test.ts');
  });

  it('should return an empty list without a stack', () => {
    expect(stackFrames(undefined)).toEqual([]);
    expect(stackFrames({ message: 'no stack' })).toEqual([]);
  });

  it('should read frames from a real error', () => {
    const frames = stackFrames(new Error('real'));

    expect(frames.length).toBeGreaterThan(0);
    expect(frames[0]).toContain('stack.test.ts');
  });
});
