import { PassThrough, Writable } from 'stream';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { getOpenSession, getSession, getSessionTurns } from '../../src/db.js';
import { runConsoleChannel } from '../../src/console-channel.js';
import { fixedReply, fixedText } from '../mocks/inference.mock.js';
import { closeTestDatabases, openTestDatabases } from '../utils/db.js';

beforeEach(() => {
  openTestDatabases();
});

afterEach(() => {
  closeTestDatabases();
});

describe('runConsoleChannel', () => {
  it('answers each line and starts a new session after /end', async () => {
    const input = new PassThrough();
    let written = '';
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written += chunk.toString();
        callback();
      },
    });

    const done = runConsoleChannel({
      conversationId: 'console-test',
      toolCompletion: fixedReply('Hi!'),
      textCompletion: fixedText('{"memories": []}'),
      input,
      output,
    });
    input.write('hello\n\n/end\nhi again\n');
    input.end();
    await done;

    expect(written).toBe('Kioku: Hi!\nKioku: Hi!\n');
    expect(getSession(1).ended_at).not.toBeNull();
    expect(getSessionTurns(1).map((t) => t.content)).toEqual(['hello', 'Hi!']);
    expect(getOpenSession('console-test')?.id).toBe(2);
    expect(getSessionTurns(2).map((t) => t.content)).toEqual(['hi again', 'Hi!']);
  });
});
