import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../observability/logger';
import { ToolRegistry } from './registry';
import { encodeTerminalResult, terminalResultSchema } from './terminal';

export type SlideToolName =
  | 'create_folder'
  | 'create_file'
  | 'read_file'
  | 'update_file'
  | 'list_files'
  | 'return_presentation_result';

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Maps workspace-relative paths to absolute ones, refusing anything outside the root. */
export class Workspace {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(relPath: string): string {
    const abs = path.resolve(this.root, relPath);
    const rel = path.relative(this.root, abs);
    if (rel.startsWith('..') || path.isAbsolute(rel)) {
      throw new Error(`path escapes the workspace: ${relPath}`);
    }
    return abs;
  }

  display(absPath: string): string {
    return path.relative(this.root, absPath).split(path.sep).join('/') || '.';
  }

  async exists(relPath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(relPath));
      return true;
    } catch {
      return false;
    }
  }
}

const folderInput = z.object({ folder_path: z.string().min(1) });
const writeInput = z.object({ file_path: z.string().min(1), content: z.string() });
const readInput = z.object({ file_path: z.string().min(1) });
const listInput = z.object({ directory: z.string().min(1).optional() });

export function createSlideTools(workspaceDir: string, defaultDirectory = 'slides'): ToolRegistry<SlideToolName> {
  const ws = new Workspace(workspaceDir);
  const registry = new ToolRegistry<SlideToolName>();

  registry.register({
    name: 'create_folder',
    description: 'Create a folder inside the workspace, e.g. slides/assets. Parent folders are created as needed.',
    inputSchema: {
      type: 'object',
      properties: {
        folder_path: { type: 'string', description: "Folder path relative to the project root, e.g. 'slides/assets'" }
      },
      required: ['folder_path']
    },
    input: folderInput,
    handler: async ({ folder_path }) => {
      try {
        const abs = ws.resolve(folder_path);
        await fs.mkdir(abs, { recursive: true });
        return `Successfully created folder: ${ws.display(abs)}`;
      } catch (err) {
        return `Error creating folder: ${errorMessage(err)}`;
      }
    }
  });

  registry.register({
    name: 'create_file',
    description:
      'Create an HTML slide file or a CSS file. The content must be the complete file: for HTML, the full document ' +
      'with DOCTYPE, head and body and any CDN imports it needs.',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: "Where to create the file, e.g. 'slides/slide_1.html'" },
        content: { type: 'string', description: 'Complete file content' }
      },
      required: ['file_path', 'content']
    },
    input: writeInput,
    handler: async ({ file_path, content }) => {
      try {
        const abs = ws.resolve(file_path);
        await fs.mkdir(path.dirname(abs), { recursive: true });
        await fs.writeFile(abs, content, 'utf8');
        return `Successfully created file: ${ws.display(abs)} (${content.length} characters)`;
      } catch (err) {
        return `Error creating file: ${errorMessage(err)}`;
      }
    }
  });

  registry.register({
    name: 'read_file',
    description: 'Read an existing file, e.g. to review a slide created earlier.',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Path of the file to read' }
      },
      required: ['file_path']
    },
    input: readInput,
    handler: async ({ file_path }) => {
      try {
        const abs = ws.resolve(file_path);
        const content = await fs.readFile(abs, 'utf8');
        return `File contents of ${ws.display(abs)}:\n\n${content}`;
      } catch (err) {
        if (errorCode(err) === 'ENOENT') return `Error: File not found: ${file_path}`;
        return `Error reading file: ${errorMessage(err)}`;
      }
    }
  });

  registry.register({
    name: 'update_file',
    description: 'Replace the content of an existing file. The content must be the complete updated file.',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Path of the file to update' },
        content: { type: 'string', description: 'Complete updated file content' }
      },
      required: ['file_path', 'content']
    },
    input: writeInput,
    handler: async ({ file_path, content }) => {
      try {
        const abs = ws.resolve(file_path);
        if (!(await ws.exists(file_path))) {
          return `Error: File does not exist: ${file_path}. Use create_file instead.`;
        }
        await fs.writeFile(abs, content, 'utf8');
        return `Successfully updated file: ${ws.display(abs)} (${content.length} characters)`;
      } catch (err) {
        return `Error updating file: ${errorMessage(err)}`;
      }
    }
  });

  registry.register({
    name: 'list_files',
    description: `List the files of a directory (default: '${defaultDirectory}').`,
    inputSchema: {
      type: 'object',
      properties: {
        directory: { type: 'string', description: `Directory to list (default: '${defaultDirectory}')` }
      },
      required: []
    },
    input: listInput,
    handler: async ({ directory = defaultDirectory }) => {
      try {
        const abs = ws.resolve(directory);
        if (!(await ws.exists(directory))) {
          return `Directory does not exist: ${directory}`;
        }
        const entries = await fs.readdir(abs, { withFileTypes: true });
        const files = entries
          .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
          .map((entry) => ws.display(path.join(abs, entry.name)))
          .sort();
        if (files.length === 0) {
          return `No files found in ${directory}`;
        }
        return `Files in ${directory}:\n${files.map((f) => `  - ${f}`).join('\n')}`;
      } catch (err) {
        return `Error listing files: ${errorMessage(err)}`;
      }
    }
  });

  registry.register({
    name: 'return_presentation_result',
    description:
      'Report the final result of the generation. Call this exactly once, after every slide has been created; ' +
      'it ends the session.',
    inputSchema: {
      type: 'object',
      properties: {
        success: { type: 'boolean', description: 'Whether the presentation was generated successfully' },
        message: { type: 'string', description: 'Summary of the generated presentation' },
        slide_count: { type: 'integer', description: 'Number of slides created' },
        slide_files: {
          type: 'array',
          items: { type: 'string' },
          description: 'Slide file paths in presentation order'
        }
      },
      required: ['success', 'message', 'slide_count', 'slide_files']
    },
    input: terminalResultSchema,
    handler: async (result) => ({ kind: 'terminal', content: encodeTerminalResult(result) })
  });

  return registry;
}
