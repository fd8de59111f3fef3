#!/usr/bin/env node
/**
 * wakeline CLI
 *
 * Usage:
 *   wakeline                  - Console mode (type instead of talking)
 *   wakeline --mode audio     - Microphone + speaker via arecord/aplay
 *   wakeline --verbose        - Debug logging
 *   wakeline --help           - Show help
 *
 * Settings come from WAKELINE_* environment variables or a .env file.
 */

import 'dotenv/config';
import { loadConfig, type AssistantMode } from './config';
import { createAssistant } from './assistant';
import { ConfigError, errorMessage } from './core/errors';
import { setLogLevel } from './utils/logger';

interface CliArgs {
  mode?: AssistantMode;
  verbose: boolean;
  help: boolean;
}

const HELP = `wakeline — wake-word voice assistant

Usage: wakeline [options]

Options:
  --mode <console|audio>  Interaction mode (default: WAKELINE_MODE or console)
  --verbose, -v           Debug logging
  --help, -h              Show this help

Environment:
  WAKELINE_CHAT_BACKEND   http | openai | gateway (default: http)
  WAKELINE_CHAT_URL       Chat backend URL
  WAKELINE_CHAT_TOKEN     Bearer/gateway token
  WAKELINE_STT_URL        Speech-to-text service (audio mode)
  WAKELINE_TTS_URL        Text-to-speech service (audio mode)
  WAKELINE_FOLLOW_UP_TIMEOUT_MS, WAKELINE_INTERRUPTION_THRESHOLD,
  WAKELINE_ALLOW_INTERRUPTION, WAKELINE_AUDIO_FEEDBACK, WAKELINE_LOG_LEVEL, ...
`;

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--verbose':
      case '-v':
        args.verbose = true;
        break;
      case '--mode': {
        const value = argv[++i];
        if (value !== 'console' && value !== 'audio') {
          throw new ConfigError(`--mode must be "console" or "audio" (got ${value === undefined ? 'nothing' : `"${value}"`})`);
        }
        args.mode = value;
        break;
      }
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(HELP);
    return 0;
  }

  const config = loadConfig();
  if (args.mode) config.mode = args.mode;
  if (config.logLevel) setLogLevel(config.logLevel);
  if (args.verbose) setLogLevel('debug');

  const assistant = createAssistant(config);

  // First Ctrl+C ends at the next wake prompt; the second exits at once
  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) process.exit(130);
    interrupted = true;
    process.stdout.write('\nShutting down...\n');
    assistant.requestShutdown();
  });

  try {
    await assistant.controller.run();
    return 0;
  } finally {
    assistant.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigError) {
      process.stderr.write(`wakeline: ${err.message}\n`);
      process.exit(2);
    }
    process.stderr.write(`wakeline: ${errorMessage(err)}\n`);
    process.exit(1);
  },
);
