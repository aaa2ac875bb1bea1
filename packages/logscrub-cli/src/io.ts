import fs from 'node:fs/promises';
import path from 'node:path';

export interface CommandIo {
  stdin: NodeJS.ReadableStream;
  stdout: { write(chunk: string): unknown };
}

export const processIo: CommandIo = {
  stdin: process.stdin,
  stdout: process.stdout,
};

export async function readAll(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

export interface InputFile {
  path: string;
  /** Where the file lands under `--out-dir`. */
  relative: string;
}

/**
 * Expand the paths given on the command line into files. Directories are only
 * walked with `recursive`; entries come back sorted so runs are repeatable.
 */
export async function collectFiles(paths: readonly string[], recursive: boolean): Promise<InputFile[]> {
  const files: InputFile[] = [];

  for (const input of paths) {
    const stat = await fs.stat(input);
    if (stat.isFile()) {
      files.push({ path: input, relative: path.basename(input) });
      continue;
    }
    if (!stat.isDirectory()) {
      throw new Error(`${input} is not a regular file or directory`);
    }
    if (!recursive) {
      throw new Error(`${input} is a directory; pass --recursive to process it`);
    }
    for (const file of await walk(input)) {
      files.push({ path: file, relative: path.relative(input, file) });
    }
  }

  return files;
}

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const out: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      out.push(...(await walk(full)));
    } else if (entry.isFile()) {
      out.push(full);
    }
  }
  return out;
}
