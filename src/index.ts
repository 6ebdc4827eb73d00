#!/usr/bin/env node
import { CliOptions, EXIT_CODES, USAGE, exitCodeFor, parseArgs } from './cli';
import { ScraperConfig, loadScraperConfig } from './config/scraper.config';
import { IFundingRepository } from './database/interfaces/IFundingRepository';
import { InMemoryFundingRepository } from './database/memory.client';
import { SupabaseFundingRepository, createSupabaseClient } from './database/supabase.client';
import { AlertNotifier, IAlertNotifier } from './services/AlertNotifier';
import { ArbitrageDetector } from './services/ArbitrageDetector';
import { FundingScheduler } from './services/FundingScheduler';
import {
  ReportService,
  formatCoinStats,
  formatMover,
  formatOpportunity,
  formatRun,
} from './services/ReportService';
import { FileDiagnosticsWriter } from './sources/BaseSourceClient';
import { HyperliquidFundingSource } from './sources/hyperliquid/HyperliquidFundingSource';
import { ISourceClient } from './sources/interfaces/ISourceClient';
import { ConfigurationError, describeError } from './utils/errors';
import { logError, logger } from './utils/logger';

export interface CollectorOverrides {
  source?: ISourceClient;
  repository?: IFundingRepository;
  notifier?: IAlertNotifier | null;
  /** Where command output goes; stdout by default */
  print?: (line: string) => void;
  /** Registers shutdown handlers for the daemon; process signals by default */
  onShutdownSignal?: (handler: () => void) => void;
}

const defaultPrint = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

const listenForSignals = (handler: () => void): void => {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    handler();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

/** Wires configuration, source, store and services for one CLI invocation */
export class FundingCollector {
  private readonly config: Readonly<ScraperConfig>;
  private readonly repository: IFundingRepository;
  private readonly source: ISourceClient;
  private readonly scheduler: FundingScheduler;
  private readonly reports: ReportService;
  private readonly print: (line: string) => void;
  private readonly onShutdownSignal: (handler: () => void) => void;

  constructor(
    config: Readonly<ScraperConfig>,
    private readonly options: CliOptions,
    overrides: CollectorOverrides = {}
  ) {
    this.config = options.timeframes ? { ...config, timeframes: options.timeframes } : config;
    this.print = overrides.print ?? defaultPrint;
    this.onShutdownSignal = overrides.onShutdownSignal ?? listenForSignals;

    this.repository =
      overrides.repository ??
      (options.dryRun
        ? new InMemoryFundingRepository()
        : new SupabaseFundingRepository(createSupabaseClient(this.config), this.config.batchInsertSize));

    this.source =
      overrides.source ??
      new HyperliquidFundingSource({
        baseUrl: this.config.sourceUrl,
        pageLoadWaitMs: this.config.pageLoadWaitMs,
        overallTimeoutMs: this.config.overallTimeoutMs,
        diagnostics: new FileDiagnosticsWriter(this.config.diagnosticsDir),
      });

    const notifier =
      overrides.notifier !== undefined
        ? overrides.notifier
        : AlertNotifier.fromConfig(this.repository, this.config.telegram);

    this.scheduler = new FundingScheduler(this.config, {
      source: this.source,
      repository: this.repository,
      detector: new ArbitrageDetector(this.config.arbitrageThreshold),
      notifier,
    });
    this.reports = new ReportService(this.repository, this.config.arbitrageThreshold);
  }

  /** Runs the selected command and returns the process exit code */
  public async run(): Promise<number> {
    try {
      return await this.dispatch();
    } finally {
      await this.source.close();
      await this.repository.close();
    }
  }

  private async dispatch(): Promise<number> {
    const timeframe = this.config.timeframes[0];

    switch (this.options.command) {
      case 'daemon':
        return this.runDaemon();

      case 'run-once': {
        const result = await this.scheduler.runOnce();
        result.runs.forEach((run) => this.print(formatRun(run)));
        this.print(`Tick finished: ${result.outcome}`);
        return exitCodeFor(result.outcome);
      }

      case 'test-connection': {
        const connected = await this.repository.testConnection();
        this.print(connected ? 'Database connection OK' : 'Database connection failed');
        return connected ? EXIT_CODES.success : EXIT_CODES.failure;
      }

      case 'cleanup': {
        const cutoff = new Date(Date.now() - this.config.retentionDays * 24 * 3600 * 1000);
        const purged = await this.repository.purgeOlderThan(cutoff);
        this.print(
          `Deleted ${purged.snapshots} snapshots, ${purged.alerts} alerts and ${purged.runs} runs older than ${cutoff.toISOString()}`
        );
        return EXIT_CODES.success;
      }

      case 'stats': {
        const stats = this.options.coin
          ? [await this.reports.coinStats(this.options.coin, timeframe)]
          : await this.reports.topCoinStats(timeframe);
        if (stats.length === 0) {
          this.print(`No ${timeframe} data yet`);
        }
        stats.forEach((entry) => this.print(formatCoinStats(entry)));
        return EXIT_CODES.success;
      }

      case 'arbitrage': {
        const opportunities = await this.reports.currentOpportunities(timeframe);
        this.print(
          `${opportunities.length} ${timeframe} opportunities at >= ${this.config.arbitrageThreshold} points`
        );
        opportunities.forEach((alert, index) => this.print(formatOpportunity(alert, index)));
        return EXIT_CODES.success;
      }

      case 'top-movers': {
        const movers = await this.reports.topMovers(timeframe);
        this.print(`Top ${timeframe} funding movers over 24h`);
        movers.forEach((mover, index) => this.print(formatMover(mover, index)));
        return EXIT_CODES.success;
      }

      case 'runs': {
        const [runs, stats] = await Promise.all([this.reports.recentRuns(), this.reports.runStats()]);
        this.print(
          `Last 24h: ${stats.totalRuns} runs (${stats.byStatus.success} success, ` +
            `${stats.byStatus.partial} partial, ${stats.byStatus.failed} failed)`
        );
        runs.forEach((run) => this.print(formatRun(run)));
        return EXIT_CODES.success;
      }

      case 'export-json': {
        if (!this.options.file) {
          throw new ConfigurationError(['--export-json needs a file path']);
        }
        const document = await this.reports.exportJson(this.options.file, timeframe);
        this.print(`Wrote ${document.snapshots.length} ${timeframe} snapshots to ${this.options.file}`);
        return EXIT_CODES.success;
      }
    }
  }

  private async runDaemon(): Promise<number> {
    const connected = await this.repository.testConnection();
    if (!connected) {
      logger.error('Database is unreachable, not starting the daemon');
      return EXIT_CODES.failure;
    }

    this.onShutdownSignal(() => {
      this.scheduler.stop().catch((error: unknown) => {
        logger.error('Error while stopping the scheduler', { error: describeError(error) });
      });
    });

    await this.scheduler.start();
    return EXIT_CODES.success;
  }
}

export const main = async (
  argv: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
  overrides: CollectorOverrides = {}
): Promise<number> => {
  if (argv.includes('--help') || argv.includes('-h')) {
    (overrides.print ?? defaultPrint)(USAGE);
    return EXIT_CODES.success;
  }

  let collector: FundingCollector;
  try {
    const options = parseArgs(argv);
    const config = loadScraperConfig(env, { requireDatabase: !options.dryRun && !overrides.repository });
    collector = new FundingCollector(config, options, overrides);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return EXIT_CODES.configuration;
    }
    throw error;
  }

  try {
    return await collector.run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return EXIT_CODES.configuration;
    }
    logError(error instanceof Error ? error : new Error(String(error)), { context: 'main' });
    return EXIT_CODES.failure;
  }
};

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Fatal error', { error: describeError(error) });
      process.exitCode = EXIT_CODES.failure;
    });
}
