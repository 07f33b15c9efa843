import { createContext, Script, type Context } from 'vm';
import {
  createExceptionResult,
  createResult,
  SCRIPT_MARKER,
  ValueFormatter,
  type ExceptionResultNode,
  type FormatterOptions,
  type ResultNode,
} from '../src/index.ts';

export type RunOutcome =
  | { kind: 'result'; node: ResultNode }
  | { kind: 'exception'; node: ExceptionResultNode };

/**
 * Runs submissions one after another inside a single persistent context.
 * Each submission is compiled under a marked file name so its frames can be told apart from host frames.
 */
export class ScriptRunner {
  private context: Context;
  private formatter: ValueFormatter;
  private submissions: number = 0;

  constructor(globals: Record<string, unknown> = {}, options: FormatterOptions = {}) {
    this.context = createContext({ ...globals });
    this.formatter = new ValueFormatter(options);
  }

  get submissionCount(): number {
    return this.submissions;
  }

  async run(code: string): Promise<RunOutcome> {
    this.submissions++;
    const filename = `${SCRIPT_MARKER}submission-${this.submissions}`;

    try {
      const script = new Script(code, { filename });
      const value: unknown = await script.runInContext(this.context);

      return { kind: 'result', node: createResult(value, undefined, this.formatter) };
    } catch (error) {
      return { kind: 'exception', node: createExceptionResult(error, this.formatter) };
    }
  }
}
