import { pathToFileURL } from 'node:url';
import { ConfigurationError, toError } from '@core/errors.ts';
import { Harness } from '@/fixtures/Harness.ts';
import { allSuites } from '@/suites/index.ts';
import { type SessionReport, type TestSelection, testCategories, testTags } from '@/types/index.ts';
import { Command, Option } from 'commander';
import { z } from 'zod';

const runOptionsSchema = z.object({
  category: z.array(z.enum(testCategories)).optional(),
  tag: z.array(z.enum(testTags)).optional(),
  grep: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  root: z.string().min(1).optional(),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

/**
 * Human-readable end-of-run summary
 */
export function formatSummary(report: SessionReport): string {
  const lines: string[] = [];

  for (const outcome of report.outcomes) {
    if (outcome.result === 'failed') {
      const error = outcome.error ? ` ${outcome.error.name}: ${outcome.error.message}` : '';
      const reason = outcome.reason ? ` (${outcome.reason})` : '';
      lines.push(
        `FAILED  [${outcome.category}] ${outcome.testId} (${outcome.phase})${error}${reason}`
      );
      if (outcome.screenshot) {
        lines.push(`        screenshot: ${outcome.screenshot}`);
      }
    } else if (outcome.result === 'skipped') {
      lines.push(
        `SKIPPED [${outcome.category}] ${outcome.testId} (${outcome.reason ?? 'no reason'})`
      );
    }
  }

  for (const error of report.sessionErrors) {
    lines.push(`ERROR   session teardown ${error.name}: ${error.message}`);
  }

  const seconds = (report.durationMs / 1000).toFixed(2);
  lines.push(
    `${report.passed} passed, ${report.failed} failed, ${report.skipped} skipped in ${seconds}s`
  );

  return lines.join('\n');
}

function toSelection(options: RunOptions): TestSelection {
  return {
    ...(options.category ? { categories: options.category } : {}),
    ...(options.tag ? { tags: options.tag } : {}),
    ...(options.grep ? { grep: options.grep } : {}),
  };
}

/**
 * Build the CLI program
 */
export function createProgram(): Command {
  const program = new Command('harness').description(
    'Fixture-provisioning test harness for HTTP APIs and browser flows'
  );

  program
    .command('run')
    .description('Run the test suites and exit non-zero if any test failed')
    .addOption(
      new Option('-c, --category <category...>', 'only these categories').choices([
        ...testCategories,
      ])
    )
    .addOption(
      new Option('-t, --tag <tag...>', 'only tests with one of these tags').choices([...testTags])
    )
    .option('-g, --grep <text>', 'only tests whose id contains the text')
    .option('--config <file>', 'run configuration file, relative to the root')
    .option('--root <dir>', 'project root holding config/, data/ and reports/')
    .action(async (raw: unknown) => {
      const parsed = runOptionsSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid options: ${parsed.error.message}`);
      }

      const options = parsed.data;
      const harness = new Harness({ rootDir: options.root, configFile: options.config });

      try {
        await harness.init();
        const report = await harness.run(allSuites, toSelection(options));
        console.log(formatSummary(report));
        process.exitCode = report.exitCode;
      } finally {
        await harness.close();
      }
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const normalized = toError(error);
    console.error(`${normalized.name}: ${normalized.message}`);
    process.exitCode = 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  await main();
}
