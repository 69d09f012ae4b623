import { command, flag, option, run } from 'cmd-ts';
import { string, number, boolean } from 'cmd-ts';
import dotenv from 'dotenv';
import { getLogger } from './utils/logger.js';
import { loadConfig, requireSetting } from './utils/config.js';
import { closeDatabase, getDatabase } from './database/connection.js';
import { JobService } from './services/jobService.js';
import { SolrService } from './services/solrService.js';
import { HistoryService } from './services/historyService.js';
import { verifyDbSolrSync } from './commands/verifySync.js';
import { checkJobIds, formatDocument, parseIdList, readIdsFromCsv } from './commands/checkIds.js';
import { analyzeReport, defaultReportPath } from './commands/analyzeReport.js';
import { formatHistoryView, loadHistoryView } from './commands/showHistory.js';

// Load environment variables
dotenv.config();

const logger = getLogger(import.meta.url);

// Command to compare recently modified jobs against the index
const verifySyncCmd = command({
  name: 'verify-sync',
  description: 'Verify that recently modified jobs match their search index documents',
  args: {
    windowHours: option({
      type: number,
      long: 'window-hours',
      short: 'w',
      description: 'Look-back window in hours (default: SYNC_WINDOW_HOURS)',
      defaultValue: () => 0,
    }),
    maxJobs: option({
      type: number,
      long: 'max-jobs',
      short: 'm',
      description: 'Maximum number of jobs to compare, 0 for all (default: SYNC_MAX_JOBS)',
      defaultValue: () => -1,
    }),
    strict: flag({
      type: boolean,
      long: 'strict',
      description: 'Exit with code 1 when any job is out of sync',
      defaultValue: () => false,
    }),
  },
  handler: async (args) => {
    try {
      const config = loadConfig();
      if (args.windowHours > 0) config.sync.windowHours = args.windowHours;
      if (args.maxJobs >= 0) config.sync.maxJobs = args.maxJobs;
      if (args.strict) config.sync.allowFailures = false;

      const db = getDatabase(requireSetting(config.databaseUrl, 'DATABASE_URL'));
      const solr = new SolrService({ ...config.solr, url: requireSetting(config.solr.url, 'SOLR_URL') });
      const history = new HistoryService(config.history);

      const result = await verifyDbSolrSync(config, {
        jobs: new JobService(db),
        index: solr,
        history,
        logger,
      });
      logger.info({ report: result.written.jsonPath, csv: result.written.csvPath }, 'Verification finished');
      process.exitCode = result.exitCode;
    } catch (error) {
      logger.error(error, 'Sync verification failed');
      process.exitCode = 1;
    } finally {
      await closeDatabase();
    }
  },
});

// Command to look up specific job ids in the index
const checkIdsCmd = command({
  name: 'check-ids',
  description: 'Show the index documents of specific job ids',
  args: {
    ids: option({
      type: string,
      long: 'ids',
      short: 'i',
      description: 'Comma or space separated job ids',
      defaultValue: () => '',
    }),
    file: option({
      type: string,
      long: 'file',
      short: 'f',
      description: 'CSV file with an id column',
      defaultValue: () => '',
    }),
  },
  handler: async (args) => {
    try {
      const ids = args.file ? await readIdsFromCsv(args.file) : parseIdList(args.ids);
      if (ids.length === 0) {
        logger.error('Provide job ids with --ids or --file');
        process.exitCode = 1;
        return;
      }

      const config = loadConfig();
      const solr = new SolrService({ ...config.solr, url: requireSetting(config.solr.url, 'SOLR_URL') });
      const result = await checkJobIds(solr, ids);

      for (const doc of result.found) {
        logger.info(`\n${formatDocument(doc)}`);
      }
      if (result.notFound.length > 0) {
        logger.warn({ ids: result.notFound }, `${result.notFound.length} job id(s) not found in index`);
      }
    } catch (error) {
      logger.error(error, 'Failed to check job ids');
      process.exitCode = 1;
    }
  },
});

// Command to summarize the last failure report
const analyzeReportCmd = command({
  name: 'analyze-report',
  description: 'Summarize a failure report by category and field',
  args: {
    file: option({
      type: string,
      long: 'file',
      short: 'f',
      description: 'Failure report JSON (default: REPORTS_DIR/db_solr_sync_failures.json)',
      defaultValue: () => '',
    }),
  },
  handler: async (args) => {
    try {
      const config = loadConfig();
      const result = await analyzeReport(args.file || defaultReportPath(config.reportsDir));
      logger.info(`\n${result.text}`);
    } catch (error) {
      logger.error(error, 'Failed to analyze report');
      process.exitCode = 1;
    }
  },
});

// Command to show the per-day run history
const historyCmd = command({
  name: 'history',
  description: 'Show the recorded verification history per day',
  args: {
    testName: option({
      type: string,
      long: 'test',
      short: 't',
      description: 'Test name (default: HISTORY_TEST_NAME)',
      defaultValue: () => '',
    }),
    days: option({
      type: number,
      long: 'days',
      short: 'd',
      description: 'Number of days to show',
      defaultValue: () => 7,
    }),
    json: flag({
      type: boolean,
      long: 'json',
      description: 'Print the stored entries as JSON',
      defaultValue: () => false,
    }),
  },
  handler: async (args) => {
    try {
      const config = loadConfig();
      const history = new HistoryService(config.history);
      const view = await loadHistoryView(history, args.testName || config.history.testName, args.days);

      if (args.json) {
        process.stdout.write(`${JSON.stringify(view.entries, null, 2)}\n`);
        return;
      }
      logger.info(`\n${formatHistoryView(view)}`);
    } catch (error) {
      logger.error(error, 'Failed to read history');
      process.exitCode = 1;
    }
  },
});

// Main command with subcommands
const mainCmd = command({
  name: 'jobboard-sync-verifier',
  description: 'Database to search index sync verification for job postings',
  version: '1.0.0',
  args: {},
  handler: async () => {
    logger.info('Job board sync verifier');
    logger.info('Available commands:');
    logger.info('  verify-sync     - Compare recently modified jobs with the index');
    logger.info('  check-ids       - Show the index documents of specific job ids');
    logger.info('  analyze-report  - Summarize the last failure report');
    logger.info('  history         - Show the per-day verification history');
    logger.info('Use --help with any command for more information');
  },
});

const commandName = process.argv[2];
const commandArgs = process.argv.slice(3);

switch (commandName) {
  case 'verify-sync':
    await run(verifySyncCmd, commandArgs);
    break;
  case 'check-ids':
    await run(checkIdsCmd, commandArgs);
    break;
  case 'analyze-report':
    await run(analyzeReportCmd, commandArgs);
    break;
  case 'history':
    await run(historyCmd, commandArgs);
    break;
  default:
    await run(mainCmd, process.argv.slice(2));
}
