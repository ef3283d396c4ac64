import readline from 'node:readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import {
  AuthError,
  HttpError,
  PineClient,
  isPineError,
  loadConfig,
  type AuthApi,
  type PineClientConfig,
  type SessionsApi,
} from '@pine-sdk/client';
import type { NormalizedEvent } from '@pine-sdk/shared';

import {
  clearCredentials,
  defaultCredentialsPath,
  loadCredentials,
  saveCredentials,
} from './credentials';
import { formatEvent } from './render';

export const EXIT_OK = 0;
export const EXIT_UNKNOWN_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_NOT_LOGGED_IN = 3;
export const EXIT_HTTP_ERROR = 4;

const VERSION = '0.1.0';
export const NOT_LOGGED_IN_MESSAGE =
  'Not logged in. Run `pine auth login` or set PINE_ACCESS_TOKEN and PINE_USER_ID.';

export class CliExitError extends Error {
  constructor(
    readonly exitCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'CliExitError';
  }
}

/** The part of `PineClient` the commands use. */
export interface CliClient {
  readonly auth: Pick<AuthApi, 'requestCode' | 'verifyCode'>;
  readonly sessions: Pick<SessionsApi, 'list' | 'create' | 'delete' | 'startTask' | 'stopTask'>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  joinSession(sessionId: string): Promise<unknown>;
  chat(sessionId: string, content: string): AsyncGenerator<NormalizedEvent, void, undefined>;
}

export interface CliOutput {
  write(chunk: string): unknown;
}

export interface CliOptions {
  argv?: string[];
  stdout?: CliOutput;
  stderr?: CliOutput;
  stdin?: NodeJS.ReadableStream;
  credentialsPath?: string;
  loadClientConfig?: () => PineClientConfig;
  createClient?: (config: PineClientConfig) => CliClient;
}

/**
 * Parse and run one `pine` command. Resolves with the exit code; never rejects.
 */
export async function runCli(options: CliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const stdin = options.stdin ?? process.stdin;
  const credentialsPath = options.credentialsPath ?? defaultCredentialsPath();
  const createClient = options.createClient ?? ((config) => new PineClient({ config }));

  const write = (text: string) => {
    stdout.write(`${text}\n`);
  };
  const printJson = (value: unknown) => write(JSON.stringify(value, null, 2));

  let config: PineClientConfig | undefined;
  const resolveConfig = (): PineClientConfig => {
    if (!config) {
      config = options.loadClientConfig ? options.loadClientConfig() : loadConfig();
      const credentials = loadCredentials(credentialsPath);
      if (credentials) {
        config.accessToken = config.accessToken ?? credentials.access_token;
        config.userId = config.userId ?? credentials.user_id;
      }
    }
    return config;
  };

  const authenticatedClient = (): CliClient => {
    const resolved = resolveConfig();
    if (!resolved.accessToken || !resolved.userId) {
      throw new CliExitError(EXIT_NOT_LOGGED_IN, NOT_LOGGED_IN_MESSAGE);
    }
    return createClient(resolved);
  };

  const prompt = async (question: string): Promise<string> => {
    const rl = readline.createInterface({ input: stdin, terminal: false });
    try {
      stdout.write(question);
      return (await rl.question('')).trim();
    } finally {
      rl.close();
    }
  };

  const streamReply = async (
    client: CliClient,
    sessionId: string,
    content: string,
    json: boolean,
  ): Promise<void> => {
    for await (const event of client.chat(sessionId, content)) {
      if (json) {
        write(JSON.stringify(event));
        continue;
      }
      const line = formatEvent(event);
      if (line !== undefined) {
        write(line);
      }
    }
  };

  const openSession = async (client: CliClient, sessionId: string | undefined) => {
    const id = sessionId ?? (await client.sessions.create()).id;
    await client.joinSession(id);
    return id;
  };

  try {
    const parser = yargs(options.argv ?? hideBin(process.argv))
      .scriptName('pine')
      .version(VERSION)
      .usage('Usage: $0 <command> [options]')
      .exitProcess(false)
      .fail((msg: string, err: Error | undefined) => {
        if (err && err.name !== 'YError') {
          throw err;
        }
        const message = err?.message || msg || 'Invalid command usage. Run with --help for usage.';
        throw new CliExitError(EXIT_USAGE, message);
      })
      .command('auth', 'Log in and manage stored credentials', (auth) =>
        auth
          .command(
            'login',
            'Log in with an email verification code',
            (args) =>
              args
                .option('email', { type: 'string', describe: 'Account email' })
                .option('code', { type: 'string', describe: 'Verification code (prompted if omitted)' }),
            async (argv) => {
              const resolved = resolveConfig();
              const client = createClient(resolved);
              const email = argv.email ?? (await prompt('Email: '));
              if (!email) {
                throw new CliExitError(EXIT_USAGE, 'An email address is required');
              }
              const { request_token: requestToken } = await client.auth.requestCode(email);
              const code = argv.code ?? (await prompt('Verification code: '));
              if (!code) {
                throw new CliExitError(EXIT_USAGE, 'A verification code is required');
              }
              const verified = await client.auth.verifyCode(email, code, requestToken);
              saveCredentials(credentialsPath, {
                access_token: verified.access_token,
                user_id: verified.id,
                email: verified.email,
                base_url: resolved.baseUrl,
              });
              write(`Logged in as ${verified.email}`);
            },
          )
          .command(
            'status',
            'Show the stored account',
            (args) => args,
            () => {
              const credentials = loadCredentials(credentialsPath);
              if (!credentials) {
                throw new CliExitError(EXIT_NOT_LOGGED_IN, NOT_LOGGED_IN_MESSAGE);
              }
              write(`Logged in as ${credentials.email ?? 'unknown email'} (${credentials.user_id})`);
            },
          )
          .command(
            'logout',
            'Remove stored credentials',
            (args) => args,
            () => {
              write(clearCredentials(credentialsPath) ? 'Logged out' : 'Not logged in');
            },
          )
          .demandCommand(1, 'You must specify an auth command'),
      )
      .command('sessions', 'List, create and delete sessions', (sessions) =>
        sessions
          .command(
            'list',
            'List sessions',
            (args) =>
              args
                .option('state', { type: 'string', describe: 'Only sessions in this state' })
                .option('limit', { type: 'number', default: 30, describe: 'Maximum sessions' })
                .option('json', { type: 'boolean', default: false, describe: 'Output JSON' }),
            async (argv) => {
              const client = authenticatedClient();
              const result = await client.sessions.list({ state: argv.state, limit: argv.limit });
              if (argv.json) {
                printJson(result);
                return;
              }
              if (result.sessions.length === 0) {
                write('No sessions');
                return;
              }
              for (const session of result.sessions) {
                write(`${session.id}  ${session.state}  ${session.title}`);
              }
            },
          )
          .command(
            'create',
            'Create a session',
            (args) => args.option('json', { type: 'boolean', default: false }),
            async (argv) => {
              const session = await authenticatedClient().sessions.create();
              if (argv.json) {
                printJson(session);
                return;
              }
              write(`${session.id}  ${PineClient.sessionUrl(session.id)}`);
            },
          )
          .command(
            'delete <id>',
            'Delete a session',
            (args) =>
              args
                .positional('id', { type: 'string', demandOption: true })
                .option('force', { type: 'boolean', default: false }),
            async (argv) => {
              await authenticatedClient().sessions.delete(argv.id, { force: argv.force });
              write(`Deleted ${argv.id}`);
            },
          )
          .demandCommand(1, 'You must specify a sessions command'),
      )
      .command('task', 'Start or stop the task of a session', (task) =>
        task
          .command(
            'start <id>',
            'Start the task',
            (args) => args.positional('id', { type: 'string', demandOption: true }),
            async (argv) => {
              printJson(await authenticatedClient().sessions.startTask(argv.id));
            },
          )
          .command(
            'stop <id>',
            'Stop the task',
            (args) => args.positional('id', { type: 'string', demandOption: true }),
            async (argv) => {
              printJson(await authenticatedClient().sessions.stopTask(argv.id));
            },
          )
          .demandCommand(1, 'You must specify a task command'),
      )
      .command(
        'send <message>',
        'Send one message and print the reply',
        (args) =>
          args
            .positional('message', { type: 'string', demandOption: true })
            .option('session', { alias: 's', type: 'string', describe: 'Existing session id' })
            .option('json', { type: 'boolean', default: false, describe: 'One JSON event per line' }),
        async (argv) => {
          const client = authenticatedClient();
          await client.connect();
          try {
            const sessionId = await openSession(client, argv.session);
            if (!argv.json) {
              write(`Session ${sessionId}`);
            }
            await streamReply(client, sessionId, argv.message, argv.json);
          } finally {
            await client.disconnect();
          }
        },
      )
      .command(
        'chat [sessionId]',
        'Interactive chat; /quit exits',
        (args) => args.positional('sessionId', { type: 'string' }),
        async (argv) => {
          const client = authenticatedClient();
          await client.connect();
          const rl = readline.createInterface({ input: stdin, terminal: false });
          try {
            const sessionId = await openSession(client, argv.sessionId);
            write(`Session ${sessionId}  ${PineClient.sessionUrl(sessionId)}`);
            stdout.write('> ');
            for await (const line of rl) {
              const text = line.trim();
              if (text === '/quit' || text === '/exit') {
                break;
              }
              if (text) {
                await streamReply(client, sessionId, text, false);
              }
              stdout.write('> ');
            }
          } finally {
            rl.close();
            await client.disconnect();
          }
        },
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .help();

    await parser.parseAsync();
    return EXIT_OK;
  } catch (error: unknown) {
    return handleCliError(error, stderr);
  }
}

export function handleCliError(error: unknown, stderr: CliOutput): number {
  if (error instanceof CliExitError) {
    stderr.write(`${error.message}\n`);
    return error.exitCode;
  }

  if (error instanceof HttpError) {
    const bodyText = error.body !== undefined ? `\n${JSON.stringify(error.body, null, 2)}` : '';
    stderr.write(`Request failed: ${error.message}${bodyText}\n`);
    return EXIT_HTTP_ERROR;
  }

  if (error instanceof AuthError) {
    stderr.write(`${error.message}\n`);
    return EXIT_NOT_LOGGED_IN;
  }

  if (isPineError(error)) {
    stderr.write(`${error.code}: ${error.message}\n`);
    return EXIT_UNKNOWN_ERROR;
  }

  const message = error instanceof Error ? error.message : String(error);
  stderr.write(`Unexpected error: ${message}\n`);
  return EXIT_UNKNOWN_ERROR;
}
