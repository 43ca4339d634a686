import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError, Option } from 'commander';
import { AppModule } from './app.module';
import { formatFatalError } from './common/health-check.error';
import { StderrLogger } from './common/stderr-logger';
import { isValidRegion } from './config/configuration';
import { HealthCheckService } from './health-check/health-check.service';
import { ReportService } from './report/report.service';
import { HealthReport } from './report/report.types';

export interface CliOptions {
  region?: string;
  output?: string;
  json?: boolean;
  verbose?: boolean;
}

export type Writer = (text: string) => void;

const stdout: Writer = (text) => {
  process.stdout.write(text);
};

export function parseRegion(value: string): string {
  const region = value.trim();
  if (!isValidRegion(region)) {
    throw new InvalidArgumentError(`"${value}" is not an AWS region name.`);
  }
  return region;
}

export function logLevels(verbose = false): LogLevel[] {
  return verbose ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn'];
}

export function createProgram(
  action: (options: CliOptions) => Promise<void>,
): Command {
  return new Command()
    .name('aws-health-checker')
    .description(
      'AWS Resource Health Checker - report EC2 instance and CloudWatch alarm state',
    )
    .addOption(
      new Option(
        '-r, --region <region>',
        'AWS region to check (default: from environment, else eu-west-1)',
      ).argParser(parseRegion),
    )
    .option('-o, --output <file>', 'save the report to a JSON file')
    .option('--json', 'print the JSON report instead of the text report')
    .option('-v, --verbose', 'enable debug logging')
    .addHelpText(
      'after',
      `
Examples:
  $ aws-health-checker                        # check the default region
  $ aws-health-checker --region us-east-1     # check a specific region
  $ aws-health-checker --output report.json   # save to file`,
    )
    .action(async (options: CliOptions) => {
      await action(options);
    });
}

export async function emitReport(
  report: HealthReport,
  options: CliOptions,
  reportService: ReportService,
  write: Writer = stdout,
): Promise<void> {
  if (options.json) {
    write(reportService.renderJson(report));
  } else {
    write(`${reportService.renderText(report)}\n`);
  }

  if (options.output) {
    const path = await reportService.saveReport(options.output, report);
    if (!options.json) {
      write(`\n📄 Report saved to: ${path}\n`);
    }
  }

  if (!options.json) {
    write('\n✅ Health check complete!\n');
  }
}

export async function runHealthCheck(
  options: CliOptions,
  write: Writer = stdout,
): Promise<void> {
  const logger = new StderrLogger('aws-health-checker', {
    logLevels: logLevels(options.verbose),
  });
  const app = await NestFactory.createApplicationContext(
    AppModule.register({ region: options.region }),
    { logger, abortOnError: false },
  );

  try {
    const report = await app.get(HealthCheckService).run();
    await emitReport(report, options, app.get(ReportService), write);
  } finally {
    await app.close();
  }
}

// 실행 결과를 종료 코드로 돌려준다 (치명적 오류만 1)
export async function main(
  argv: string[],
  write: Writer = stdout,
): Promise<number> {
  const program = createProgram((options) => runHealthCheck(options, write));
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    new Logger('aws-health-checker').error(formatFatalError(error));
    return 1;
  }
}
