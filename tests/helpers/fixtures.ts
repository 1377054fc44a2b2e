/**
 * Test fixtures: on-disk fixture paths, temporary source trees and sample sources
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), '../fixtures');

export function getFixturePath(...parts: string[]): string {
  return path.join(FIXTURES_DIR, ...parts);
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  removeFile: (relativePath: string) => void;
  getFilePath: (relativePath: string) => string;
}

/**
 * A source tree under the OS temp directory, seeded with `files`
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tldr-project-'));
  const getFilePath = (relativePath: string): string => path.join(rootDir, relativePath);

  const addFile = (relativePath: string, content: string): string => {
    const filePath = getFilePath(relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  return {
    rootDir,
    addFile,
    getFilePath,
    removeFile: relativePath => fs.rmSync(getFilePath(relativePath), { force: true }),
    cleanup: () => fs.rmSync(rootDir, { recursive: true, force: true }),
  };
}

export const SAMPLE_TYPESCRIPT = `export function greet(name: string): string {
  return \`Hello, \${name}!\`;
}

export class UserService {
  private users = new Map<string, User>();

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }
}

interface User {
  id: string;
  name: string;
}
`;

export const SAMPLE_PYTHON = `def greet(name: str) -> str:
    return f"Hello, {name}!"


class UserService:
    def __init__(self):
        self._users = {}

    async def find_by_id(self, id: str):
        return self._users.get(id)
`;

/**
 * Python with an unterminated parameter list: one well-formed function survives
 */
export const MALFORMED_PYTHON = `def ok():
    return 1

def broken(:
    pass
`;
