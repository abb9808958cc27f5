import * as fs from 'node:fs';
import * as path from 'node:path';
import { deserializeResult } from '../engine/serialize.js';
import type { HealthScoreResult } from '../engine/types.js';

export function readJsonFile(filePath: string, cwd: string): unknown {
  const fullPath = path.resolve(cwd, filePath);
  const content = fs.readFileSync(fullPath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`${fullPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function writeJsonFile(filePath: string, cwd: string, data: unknown): string {
  const fullPath = path.resolve(cwd, filePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  return fullPath;
}

export function readResultFile(filePath: string, cwd: string): HealthScoreResult {
  return deserializeResult(readJsonFile(filePath, cwd));
}
