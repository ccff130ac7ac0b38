#!/usr/bin/env node
import * as readline from 'readline';
import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import mongoose from 'mongoose';
import { config } from './core/config';
import { errorMessage } from './core/errors';
import { commandService } from './services/command.service';
import { closeTaskStore } from './services/task.service';

async function saveDocument(fileName: string, content: Buffer): Promise<string> {
  await mkdir(config.report.outputDir, { recursive: true });
  const target = path.resolve(config.report.outputDir, fileName);
  await writeFile(target, content);
  return target;
}

async function initCLI() {
  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\n🏨 Claims Desk CLI\n');
  console.log('Type a command such as "/consulting Jasmin open" or "exit" to quit\n');

  const askQuestion = () => {
    rl.question('desk > ', async (input) => {
      const text = input.trim();

      if (text.toLowerCase() === 'exit') {
        console.log('\nGoodbye! 👋\n');
        rl.close();
        if (!(await closeTaskStore())) {
          console.error('\n❌ Could not close the task store cleanly\n');
          process.exitCode = 1;
        }
        return;
      }

      if (!text) {
        askQuestion();
        return;
      }

      try {
        const reply = await commandService.handle(text);

        console.log('━'.repeat(80));
        if (reply.kind === 'text') {
          console.log(reply.text);
        } else {
          const target = await saveDocument(reply.fileName, reply.content);
          console.log(`📄 ${reply.caption}`);
          console.log(`Saved to ${target}`);
        }
        console.log('━'.repeat(80) + '\n');
      } catch (error) {
        console.error('\n❌ Error:', errorMessage(error), '\n');
      }

      askQuestion();
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
}
