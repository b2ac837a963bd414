#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { ChatService } from './agent/chat-service';
import { createApp, ensureWorkspaceDirs } from './app';
import { config } from './config';
import type { ProgressEvent } from './core/events';
import { logger } from './observability/logger';

const HELP = `Commands:
  help          show this help
  reset         start a new conversation
  quit, exit    leave
Attach reference images with @path tokens, e.g. "use these colors @brand/logo.png".`;

export type ParsedInput = { message: string; images: string[] };

/** Splits `@path` tokens out of a line; the rest is the message. */
export function parseInput(line: string): ParsedInput {
  const images: string[] = [];
  const words: string[] = [];
  for (const token of line.trim().split(/\s+/)) {
    if (token.length > 1 && token.startsWith('@')) {
      images.push(token.slice(1));
    } else if (token) {
      words.push(token);
    }
  }
  return { message: words.join(' '), images };
}

export function describeEvent(event: ProgressEvent): string {
  switch (event.kind) {
    case 'tool_dispatched': {
      const { session, tool, iteration, is_error } = event.data;
      return `  [${session} #${iteration}] ${tool}${is_error ? ' (error)' : ''}`;
    }
    case 'rasterization_progress':
      return `  capturing slide ${event.data.slide_number}/${event.data.total_slides} (${event.data.filename})`;
    case 'assembly_progress':
      return `  adding slide ${event.data.slide_number}/${event.data.total_slides} to the deck`;
    case 'complete':
      return event.data.pptx_file
        ? `\nAssistant: ${event.data.response}\n\nDeck saved to ${event.data.pptx_file}`
        : `\nAssistant: ${event.data.response}`;
    case 'error':
      return `\nError: ${event.data.message}`;
  }
}

async function runTurn(service: ChatService, sessionId: string, parsed: ParsedInput) {
  for await (const frame of service.stream(sessionId, parsed)) {
    if (frame.type === 'event') output.write(`${describeEvent(frame.event)}\n`);
  }
}

async function main() {
  await ensureWorkspaceDirs(config);
  const { service } = createApp(config);
  let session = await service.openSession();
  const rl = createInterface({ input, output });

  output.write(`Presentation assistant. Workspace: ${config.workspaceDir}\n${HELP}\n\n`);
  try {
    while (true) {
      const line = (await rl.question('You: ')).trim();
      if (!line) continue;
      const command = line.toLowerCase();
      if (command === 'quit' || command === 'exit') break;
      if (command === 'help') {
        output.write(`${HELP}\n`);
        continue;
      }
      if (command === 'reset') {
        await service.reset(session.id);
        session = await service.openSession();
        output.write('Conversation reset.\n');
        continue;
      }

      const parsed = parseInput(line);
      if (!parsed.message) {
        output.write('Add a message next to the attached images.\n');
        continue;
      }
      await runTurn(service, session.id, parsed);
      output.write('\n');
    }
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error('cli failed', err);
    process.exit(1);
  });
}
