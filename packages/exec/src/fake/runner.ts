import type { CommandRequest, CommandResult, CommandRunner } from '../runner/runner';

/** What a scripted command produces: a (partial) result, or an error to reject with. */
export type FakeResponse = Partial<CommandResult> | Error;

export type FakeHandler = (req: CommandRequest) => FakeResponse | Promise<FakeResponse>;

/**
 * In-process CommandRunner for tests. Records every request and answers from
 * `handler`; unspecified result fields default to a silent, successful run.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: CommandRequest[] = [];

  constructor(private readonly handler: FakeHandler = () => ({})) {}

  async run(req: CommandRequest): Promise<CommandResult> {
    this.calls.push(req);
    const response = await this.handler(req);
    if (response instanceof Error) {
      throw response;
    }
    return { exitCode: 0, stdout: '', stderr: '', durationMs: 0, ...response };
  }

  /** Recorded invocations as `bin arg1 arg2 ...` lines. */
  commandLines(): string[] {
    return this.calls.map((c) => [c.bin, ...c.args].join(' '));
  }
}
