import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const expandPath = (input: string) => {
  if (!input.startsWith('~')) return input;
  return input.replace(/^~(?=$|[/\\])/, os.homedir());
};

export const resolveFrom = (root: string, input: string) => {
  const expanded = expandPath(input);
  return path.isAbsolute(expanded) ? expanded : path.resolve(expandPath(root), expanded);
};

export const ensureDir = async (input: string) => {
  await fs.mkdir(input, { recursive: true });
};
