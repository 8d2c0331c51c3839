import { z } from 'zod';
import { loadEnvLocal } from '../lib/config';
import { closePool } from '../lib/db';
import { logEvent } from '../lib/log';
import { listPosts } from '../lib/repos/posts';
import { listRecentSyncErrors } from '../lib/repos/syncErrors';
import { ensureSchema } from '../lib/schema';
import {
  cancelJobsForPost,
  clearBabbelSessions,
  createPostWithSync,
  getPostWithState,
  retryPost,
  testBabbelConnection,
  trashPost,
  untrashPost,
  updatePostWithSync,
} from '../lib/services/storySync';
import { errorMessage } from '../lib/syncErrors';
import { POST_STATUSES, type PostStatus } from '../lib/sync/types';

const USAGE = `Usage: story-sync <command> [args]

Commands:
  post:create [--title T] [--body B] [--status S] [--at ISO] [--sync]
  post:update <postId> [--title T] [--body B] [--status S] [--at ISO|none] [--sync|--no-sync]
  post:trash <postId>
  post:untrash <postId>
  post:retry <postId>
  post:show <postId>
  post:list [--status S]
  errors:list
  test-connection
  sessions:clear
  jobs:cancel <postId>`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type ParsedArgs = {
  positionals: string[];
  options: Record<string, string | boolean>;
};

export function parseCliArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string | boolean> = {};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const name = arg.slice(2);
    if (name.startsWith('no-')) {
      options[name.slice(3)] = false;
      continue;
    }
    const next = argv[index + 1];
    if (next === undefined || next.startsWith('--')) {
      options[name] = true;
      continue;
    }
    options[name] = next;
    index += 1;
  }
  return { positionals, options };
}

const postOptionsSchema = z.object({
  title: z.string().optional(),
  body: z.string().optional(),
  status: z.enum(POST_STATUSES).optional(),
  at: z.union([z.literal('none'), z.string().datetime({ offset: true })]).optional(),
  sync: z.boolean().optional(),
});

export type PostOptions = {
  title?: string;
  body?: string;
  status?: PostStatus;
  scheduledAt?: string | null;
  syncEnabled?: boolean;
};

export function readPostOptions(options: ParsedArgs['options']): PostOptions {
  const parsed = postOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliUsageError(`Invalid --${issue?.path.join('.') || 'option'}: ${issue?.message || 'invalid value'}`);
  }
  const { title, body, status, at, sync } = parsed.data;
  return {
    title,
    body,
    status,
    scheduledAt: at === undefined ? undefined : at === 'none' ? null : at,
    syncEnabled: sync,
  };
}

function requirePostId(positionals: string[]): string {
  const postId = positionals[1]?.trim();
  if (!postId) throw new CliUsageError(`${positionals[0]} requires <postId>`);
  return postId;
}

function print(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

function printOrMissing(postId: string, value: unknown) {
  if (value === null) {
    throw new CliUsageError(`Post not found: ${postId}`);
  }
  print(value);
}

async function dispatch({ positionals, options }: ParsedArgs): Promise<void> {
  const command = positionals[0];
  switch (command) {
    case 'post:create':
      print(await createPostWithSync(readPostOptions(options)));
      return;
    case 'post:update': {
      const postId = requirePostId(positionals);
      printOrMissing(postId, await updatePostWithSync(postId, readPostOptions(options)));
      return;
    }
    case 'post:trash': {
      const postId = requirePostId(positionals);
      printOrMissing(postId, await trashPost(postId));
      return;
    }
    case 'post:untrash': {
      const postId = requirePostId(positionals);
      printOrMissing(postId, await untrashPost(postId));
      return;
    }
    case 'post:retry': {
      const postId = requirePostId(positionals);
      printOrMissing(postId, await retryPost(postId));
      return;
    }
    case 'post:show': {
      const postId = requirePostId(positionals);
      printOrMissing(postId, await getPostWithState(postId));
      return;
    }
    case 'post:list':
      print(await listPosts({ status: readPostOptions(options).status }));
      return;
    case 'errors:list':
      print(await listRecentSyncErrors());
      return;
    case 'test-connection': {
      const result = await testBabbelConnection();
      print(result);
      if (!result.success) process.exitCode = 1;
      return;
    }
    case 'sessions:clear':
      print({ cleared: await clearBabbelSessions() });
      return;
    case 'jobs:cancel': {
      const postId = requirePostId(positionals);
      print({ postId, cancelled: await cancelJobsForPost(postId) });
      return;
    }
    default:
      throw new CliUsageError(command ? `Unknown command: ${command}` : 'Missing command');
  }
}

async function run() {
  await loadEnvLocal();
  const args = parseCliArgs(process.argv.slice(2));
  if (args.positionals.length === 0 || args.options.help === true) {
    console.log(USAGE);
    return;
  }
  await ensureSchema();
  await dispatch(args);
}

if (process.argv[1] && /cli[\\/]index\.[cm]?[jt]s$/.test(process.argv[1])) {
  run()
    .catch((error: unknown) => {
      if (error instanceof CliUsageError) {
        console.error(`${error.message}\n\n${USAGE}`);
      } else {
        logEvent('error', 'cli.failed', { message: errorMessage(error) });
      }
      process.exitCode = 1;
    })
    .then(() => closePool())
    .catch((error: unknown) => {
      logEvent('error', 'cli.pool_close_failed', { message: errorMessage(error) });
    });
}
