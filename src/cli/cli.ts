import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ParsedArgs } from 'minimist';
import { AppModule } from '../app.module';
import { ScrapeService } from '../scrape/scrape.service';
import { sessionFromConfig } from '../config/scrape-session';
import { ScraperError } from '../common/errors';
import { ScrapeReport } from '../types/scrape';

const logger = new Logger('CLI');

const USAGE = [
  'Usage:',
  '  # Scrape the channel configured in .env (CHANNEL_ID or CHANNEL_USERNAME)',
  '  npm run scrape',
  '  # Look up a channel id by name or @handle',
  '  npm run find-channel -- "@examplechannel"',
].join('\n');

function summarize(report: ScrapeReport) {
  return {
    mode: 'scrape',
    channel: report.channelName,
    channelId: report.channelId,
    videos: report.records.length,
    totalViews: report.totals.views,
    totalLikes: report.totals.likes,
    totalComments: report.totals.comments,
    categories: report.categoryStats,
    csv: report.output?.csvPath ?? null,
    json: report.output?.jsonPath ?? null,
    quotaExceeded: report.quotaExceeded,
    tookSec: report.tookSec,
  };
}

export type AppFactory = () => Promise<INestApplicationContext>;

const createApp: AppFactory = () =>
  NestFactory.createApplicationContext(AppModule.forRoot(), {
    logger: ['log', 'warn', 'error'],
    abortOnError: false,
  });

/** Known errors exit with their own code, anything else with 1. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ScraperError) {
    logger.error(err.message);
    return err.exitCode;
  }
  logger.error(
    `Fatal error in CLI: ${
      err instanceof Error ? (err.stack ?? err.message) : String(err)
    }`,
  );
  return 1;
}

async function runCommand(
  app: INestApplicationContext,
  command: string,
  term: string,
): Promise<number> {
  const scraper = app.get(ScrapeService);

  if (command === 'find-channel') {
    const found = await scraper.findChannel(term);
    if (!found.results.length) {
      logger.warn(`No channels found for "${term}"`);
      return 1;
    }
    console.log(JSON.stringify({ mode: 'find-channel', ...found }, null, 2));
    return 0;
  }

  const report = await scraper.run(sessionFromConfig(app.get(ConfigService)));
  console.log(JSON.stringify(summarize(report), null, 2));

  if (report.quotaExceeded) {
    logger.error(
      `API quota exhausted; saved ${report.records.length} videos ` +
        'collected before it ran out',
    );
    return 1;
  }
  return 0;
}

export async function main(
  argv: ParsedArgs,
  factory: AppFactory = createApp,
): Promise<number> {
  const [command = 'scrape', ...rest] = argv._.map(String);
  if (command !== 'scrape' && command !== 'find-channel') {
    console.error(`Unknown command: ${command}\n\n${USAGE}`);
    return 2;
  }
  const term = rest.join(' ').trim();
  if (command === 'find-channel' && !term) {
    console.error(`find-channel needs a name or @handle\n\n${USAGE}`);
    return 2;
  }

  try {
    const app = await factory();
    try {
      return await runCommand(app, command, term);
    } finally {
      await app.close();
    }
  } catch (err) {
    return exitCodeFor(err);
  }
}
