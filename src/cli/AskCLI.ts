import { ClaudeQueryClient } from '../client/ClaudeQueryClient';
import { QueryClient, settleQuery } from '../client/QueryClient';

export interface OutputStream {
  write(text: string): boolean;
}

export interface AskCLIConfig {
  /**
   * Builds the query client. Defaults to a `ClaudeQueryClient` configured
   * from the environment.
   */
  connect?: () => QueryClient;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

export type ExitCode = 0 | 1;

export type CliOutcome =
  | { kind: 'answered'; response: string }
  | { kind: 'missingArgument' }
  | { kind: 'delegateFault'; description: string };

export const MISSING_PROMPT_MESSAGE = 'No prompt provided';

/**
 * Forwards one prompt to a query client and prints the answer.
 */
export class AskCLI {
  private readonly connect: () => QueryClient;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;

  constructor(config: AskCLIConfig = {}) {
    this.connect = config.connect ?? (() => new ClaudeQueryClient());
    this.stdout = config.stdout ?? process.stdout;
    this.stderr = config.stderr ?? process.stderr;
  }

  /**
   * @param args - invocation arguments after the program name
   */
  async run(args: string[]): Promise<ExitCode> {
    return this.render(await this.ask(args));
  }

  async ask(args: string[]): Promise<CliOutcome> {
    if (args.length < 1) {
      return { kind: 'missingArgument' };
    }

    const result = await settleQuery(this.connect, args[0]);
    return result.ok
      ? { kind: 'answered', response: result.response }
      : { kind: 'delegateFault', description: result.fault };
  }

  private render(outcome: CliOutcome): ExitCode {
    switch (outcome.kind) {
      case 'answered':
        this.stdout.write(`${outcome.response}\n`);
        return 0;
      case 'missingArgument':
        this.stderr.write(`Error: ${MISSING_PROMPT_MESSAGE}\n`);
        return 1;
      case 'delegateFault':
        this.stderr.write(`Error: ${outcome.description}\n`);
        return 1;
    }
  }
}
