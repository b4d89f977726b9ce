#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'fs';
import { writeFile } from 'fs/promises';
import sharp from 'sharp';
import { USAGE, parseCliArgs, type CliOptions } from '../src/cli/args';
import { PhotoFuniaClient } from '../src/client/photoFuniaClient';
import { describeError } from '../src/client/errors';
import { NdjsonLogger } from '../src/common/logger';
import { loadConfigFromEnv } from '../src/config';
import { initTelemetry, shutdownTelemetry } from '../src/telemetry/sdk';

dotenv.config();

async function run(opts: CliOptions, logger: NdjsonLogger): Promise<void> {
  const env = loadConfigFromEnv();
  const client = new PhotoFuniaClient({
    logger,
    baseUrl: env.baseUrl,
    sessionId: env.sessionId,
    timeout: opts.timeout ?? env.timeout,
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const input = fs.createReadStream(opts.input);
  const options = { signal: controller.signal };
  let result =
    opts.effect === 'clownify'
      ? await client.clownify(input, { ...options, includeHat: opts.hat })
      : await client.fatify(input, options);

  if (opts.format) {
    result = await sharp(result).toFormat(opts.format).toBuffer();
  }
  await writeFile(opts.output, result);

  const meta = await sharp(result).metadata();
  console.log(`${opts.output} ${meta.width ?? 0}×${meta.height ?? 0}, ${meta.format ?? 'unknown'}, ${result.length} bytes`);
}

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    if ('help' in parsed) {
      console.log(USAGE);
      return;
    }
    console.error(`photo-effects: ${parsed.error}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }

  if (!fs.existsSync(parsed.options.input)) {
    console.error(`photo-effects: input not found: ${parsed.options.input}`);
    process.exitCode = 2;
    return;
  }

  initTelemetry();
  const logger = new NdjsonLogger('photo-effects', { dir: parsed.options.logDir });
  try {
    await run(parsed.options, logger);
  } catch (err) {
    console.error(`photo-effects: ${describeError(err)}`);
    console.error(`log: ${logger.path}`);
    process.exitCode = 1;
  } finally {
    await logger.close();
    await shutdownTelemetry();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
