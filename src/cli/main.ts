import { Command } from "commander";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  createPeerResolver,
  createRuntime,
} from "../application/bootstrap/runtimeFactory";
import type { ChartRequest } from "../application/services/chartRequestService";
import { env, peerGroupings } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const commaList = (transform: (item: string) => string) =>
  z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((item) => transform(item.trim()))
        .filter(Boolean),
    )
    .pipe(z.array(z.string()).min(1, "expected at least one entry"));

const symbolList = commaList((item) => item.toUpperCase());
const industryList = commaList((item) => item);
const metric = z.string().trim().min(1);

const chartOptionsSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.enum(["line", "area", "pie"]),
    metric,
    symbols: symbolList,
  }),
  z.object({
    type: z.literal("scatter"),
    metricX: metric,
    metricY: metric,
    symbols: symbolList,
  }),
  z.object({
    type: z.literal("histogram"),
    metric,
    industries: industryList,
  }),
]);

export type ChartCommandOptions = {
  type?: string;
  metric?: string;
  metricX?: string;
  metricY?: string;
  symbols?: string;
  industries?: string;
  out?: string;
};

/**
 * Validates raw chart command options into a typed request, reporting every problem in one message.
 */
export const toChartRequest = (
  opts: ChartCommandOptions,
): Result<ChartRequest, string> => {
  const parsed = chartOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    return err(
      parsed.error.issues
        .map(
          (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
        )
        .join("; "),
    );
  }

  const options = parsed.data;
  switch (options.type) {
    case "scatter":
      return ok({
        chartType: "scatter",
        metricX: options.metricX,
        metricY: options.metricY,
        symbols: options.symbols,
      });
    case "histogram":
      return ok({
        chartType: "histogram",
        metricName: options.metric,
        industries: options.industries,
      });
    default:
      return ok({
        chartType: options.type,
        metricName: options.metric,
        symbols: options.symbols,
      });
  }
};

/**
 * Defines a single command surface so every chart flows through the same orchestration policy.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("filings-compare")
    .description("Chart SEC filing metrics across peer companies");

  cli
    .command("chart")
    .description("Fetch a metric for several companies and render a chart")
    .requiredOption(
      "--type <type>",
      "Chart type: line, area, pie, scatter or histogram",
    )
    .option("--metric <metric>", "us-gaap metric, e.g. EarningsPerShareBasic")
    .option("--metric-x <metric>", "Horizontal metric for scatter charts")
    .option("--metric-y <metric>", "Vertical metric for scatter charts")
    .option(
      "--symbols <symbols>",
      "Comma-separated tickers; a single ticker is expanded to its peers",
    )
    .option(
      "--industries <industries>",
      "Comma-separated industry names for histogram charts",
    )
    .option("--out <dir>", "Directory for rendered charts")
    .action(async (opts: ChartCommandOptions) => {
      const request = toChartRequest(opts);
      if (request.isErr()) {
        logger.error(
          { options: opts },
          `Invalid chart options: ${request.error}`,
        );
        process.exitCode = 1;
        return;
      }

      const runtime = createRuntime(
        opts.out ? { ...env, CHART_OUTPUT_DIR: opts.out } : env,
      );
      const outcome = await runtime.chartRequestService.run(request.value);

      if (outcome.isErr()) {
        logger.error(
          {
            code: outcome.error.code,
            reason: outcome.error.reason,
            symbol: outcome.error.symbol,
          },
          `Chart request failed: ${outcome.error.message}`,
        );
        process.exitCode = 1;
        return;
      }

      logger.info(
        {
          chartType: outcome.value.figure.chartType,
          location: outcome.value.rendered.location,
          traces: outcome.value.figure.data.length,
          excluded: outcome.value.excluded.map((entry) => entry.subject),
        },
        "Chart rendered",
      );
    });

  cli
    .command("series")
    .description("Print the quarterly series of one metric for one company")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .requiredOption("--metric <metric>", "us-gaap metric name")
    .action(async (opts: { symbol: string; metric: string }) => {
      const runtime = createRuntime();
      const series = await runtime.metricFetcher.fetchSeries({
        symbol: opts.symbol,
        metricName: opts.metric,
      });

      if (series.isErr()) {
        process.exitCode = 1;
        return;
      }

      console.log(JSON.stringify(series.value, null, 2));
    });

  cli
    .command("peers")
    .description("List peer companies for a ticker")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .option(
      "--grouping <grouping>",
      `One of ${peerGroupings().join(", ")}`,
      "sector",
    )
    .action(async (opts: { symbol: string; grouping: string }) => {
      const grouping = peerGroupings().find((item) => item === opts.grouping);
      if (!grouping) {
        logger.error({ grouping: opts.grouping }, "Unsupported peer grouping");
        process.exitCode = 1;
        return;
      }

      const peers = await createPeerResolver(env).fetchPeers({
        symbol: opts.symbol,
        grouping,
      });

      if (peers.isErr()) {
        logger.error(
          { symbol: opts.symbol, reason: peers.error.reason },
          peers.error.message,
        );
        process.exitCode = 1;
        return;
      }

      console.log(peers.value.join("\n"));
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
