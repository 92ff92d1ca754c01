import { writeFile } from 'node:fs/promises';
import { loadVoxConfig, presetFilter } from '@vox/core';
import { FileSystemWordBankStore, OpenAISynthesisProvider, PcmEffectsProcessor, PinoLogger } from '@vox/adapters';
import { createVoxEngine } from '@vox/pipeline';
//
import { config } from 'dotenv';
config()
//

const text = process.argv[2] ?? 'Attention. All personnel, report to sector seven.';
const outFile = process.argv[3] ?? 'announcement.pcm';

const voxConfig = loadVoxConfig(process.env);
const logger = new PinoLogger({ level: voxConfig.logLevel, prettyPrint: voxConfig.prettyLogs, name: 'announce' });

const engine = createVoxEngine({
  store: new FileSystemWordBankStore({ rootDir: voxConfig.cacheDir, logger: logger.child({ component: 'store' }) }),
  provider: new OpenAISynthesisProvider({
    apiKey: process.env.OPENAI_API_KEY,
    model: process.env.OPENAI_TTS_MODEL
  }),
  effects: new PcmEffectsProcessor(),
  logger,
  config: voxConfig
});

await engine.start();

const preview = await engine.preview(text, process.env.VOX_VOICE ?? 'onyx', 'local');
logger.info({ matched: preview.matchedCount, skipped: preview.skippedCount }, 'Cache preview');

const outcome = await engine.synthesize(
  {
    input: { text },
    voiceId: process.env.VOX_VOICE ?? 'onyx',
    scopeId: 'local',
    filter: presetFilter('light')
  },
  {
    onProgress: (event) => {
      if (event.type === 'stage') {
        logger.debug({ stage: event.stage }, 'Stage changed');
      }
    }
  }
);

if (outcome.ok) {
  await writeFile(outFile, outcome.buffer);
  logger.info(
    { outFile, seconds: outcome.durationEstimate, skipped: outcome.skippedWords },
    'Announcement written (48 kHz, s16le, stereo)'
  );
} else {
  logger.error({ stage: outcome.stage, code: outcome.error.code, error: outcome.error.message }, 'Announcement failed');
  process.exitCode = 1;
}

await engine.close();
