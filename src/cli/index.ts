#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerChunkCommand } from './commands/chunk.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerMergeCommand } from './commands/merge.js';
import { registerRunCommand } from './commands/run.js';
import { describeError } from '../domain/errors/DomainErrors.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('meetsplice')
  .description('Chunk long meeting transcripts, analyze chunks in parallel, and merge the turns back')
  .version(version);

/** 全域錯誤處理（須在註冊子指令前設定，子指令才會繼承） */
program.exitOverride();

registerChunkCommand(program);
registerAnalyzeCommand(program);
registerMergeCommand(program);
registerRunCommand(program);

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander 已自行輸出說明或錯誤訊息
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${describeError(err)}\n`);
    process.exit(1);
  }
}

void main();
