import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

export const expandPath = (input: string) => {
  if (!input.startsWith('~')) return input;
  return input.replace(/^~(?=$|\/)/, os.homedir());
};

export const resolvePath = (input: string, base = process.cwd()) => {
  const expanded = expandPath(input.trim());
  if (!expanded) return '';
  return path.isAbsolute(expanded) ? expanded : path.resolve(base, expanded);
};

export const ensureParentDir = async (file: string) => {
  await fs.mkdir(path.dirname(file), { recursive: true });
};
