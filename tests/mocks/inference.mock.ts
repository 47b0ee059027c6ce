import type {
  TextCompletion,
  ToolCompletion,
  ToolCompletionRequest,
} from '../../src/memory/inference.js';

type TextResponder = (prompt: string, systemPrompt: string) => string | Promise<string>;

/** Records every call and answers through `responder`. */
export class FakeTextCompletion implements TextCompletion {
  readonly calls: { prompt: string; systemPrompt: string }[] = [];

  constructor(private readonly responder: TextResponder) {}

  async complete(prompt: string, options: { systemPrompt: string }): Promise<string> {
    this.calls.push({ prompt, systemPrompt: options.systemPrompt });
    return this.responder(prompt, options.systemPrompt);
  }
}

/** Returns the same text on every call. */
export function fixedText(text: string): FakeTextCompletion {
  return new FakeTextCompletion(() => text);
}

/** Rejects every call. */
export function failingText(message = 'inference offline'): FakeTextCompletion {
  return new FakeTextCompletion(() => {
    throw new Error(message);
  });
}

export class FakeToolCompletion implements ToolCompletion {
  readonly requests: ToolCompletionRequest[] = [];

  constructor(private readonly script: (request: ToolCompletionRequest) => Promise<string>) {}

  complete(request: ToolCompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.script(request);
  }
}

export function fixedReply(text: string): FakeToolCompletion {
  return new FakeToolCompletion(async () => text);
}
