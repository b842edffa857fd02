import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { AppModule } from '../src/app.module';
import { DIALOGUE_FILE_NAME, getDefaultQualityTier, getDefaultSampleRate, getDialogueLimits } from '../src/config/dialogue.config';
import { DialogueAssemblerService } from '../src/dialogue/dialogue-assembler.service';
import { parseQualityTier, parseSampleRate, parseTurnInputs } from '../src/dialogue/dialogue-input';

interface CliOptions {
  inputPath: string;
  outputPath: string;
}

export function parseArgs(argv: string[]): CliOptions {
  const get = (...keys: string[]) => {
    for (const key of keys) {
      const idx = argv.indexOf(key);
      if (idx >= 0 && idx < argv.length - 1) {
        return argv[idx + 1];
      }
    }
    return undefined;
  };

  const outputPath = get('--out', '-o') ?? DIALOGUE_FILE_NAME;
  const positional = argv.filter((arg, idx) => !arg.startsWith('-') && !['--out', '-o', '--input', '-i'].includes(argv[idx - 1]));
  const inputPath = get('--input', '-i') || positional[0];

  if (!inputPath) {
    throw new Error(
      'Usage: ts-node scripts/render-dialogue.ts <dialogue.json> [--out dialogue.mp3]\n' +
        'The JSON file holds { "qualityTier", "sampleRate", "turns": [{ "voiceId", "rawText", "pauseAfterMs" }] }',
    );
  }

  return { inputPath, outputPath };
}

async function run() {
  const logger = new Logger('RenderDialogue');
  const args = parseArgs(process.argv.slice(2));
  const raw: unknown = JSON.parse(await fs.readFile(args.inputPath, 'utf8'));
  if (!raw || typeof raw !== 'object') {
    throw new Error(`${args.inputPath} must contain a JSON object`);
  }

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn', 'log'] });
  try {
    const configService = app.get(ConfigService);
    const assembler = app.get(DialogueAssemblerService);
    const outcome = await assembler.assemble({
      turns: parseTurnInputs('turns' in raw ? raw.turns : undefined, getDialogueLimits(configService).maxTurns),
      qualityTier: parseQualityTier('qualityTier' in raw ? raw.qualityTier : undefined, getDefaultQualityTier(configService)),
      sampleRate: parseSampleRate('sampleRate' in raw ? raw.sampleRate : undefined, getDefaultSampleRate(configService)),
    });

    if (outcome.status === 'empty') {
      logger.warn('No dialogue to synthesise.');
      return;
    }
    if (outcome.status === 'failed') {
      logger.error(`Turn ${outcome.turnIndex + 1}: ${outcome.error.message}`);
      process.exitCode = 1;
      return;
    }

    const outputPath = path.resolve(args.outputPath);
    await fs.writeFile(outputPath, outcome.artifact.audio);
    logger.log(`Wrote ${outputPath} (${outcome.artifact.audio.length} bytes, ${outcome.artifact.segmentCount} segments)`);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  run().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
