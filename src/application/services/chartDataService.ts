import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { MetricSeries, PeerGrouping } from "../../core/entities/metric";
import type {
  IndustryCatalogPort,
  MetricFetcherPort,
  PeerResolverPort,
} from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * A symbol (or industry) left out of a chart, with the failure that excluded it.
 */
export type ExcludedEntry = {
  subject: string;
  error: AppBoundaryError;
};

export type SeriesCollection = {
  metricName: string;
  symbols: string[];
  series: MetricSeries[];
  excluded: ExcludedEntry[];
};

export type LatestPair = {
  symbol: string;
  x: MetricSeries;
  y: MetricSeries;
};

export type PairCollection = {
  metricX: string;
  metricY: string;
  symbols: string[];
  pairs: LatestPair[];
  excluded: ExcludedEntry[];
};

export type IndustrySeries = {
  industry: string;
  series: MetricSeries[];
};

export type IndustryCollection = {
  metricName: string;
  industries: IndustrySeries[];
  excluded: ExcludedEntry[];
};

type SymbolOutcome<T> = {
  symbol: string;
  result: Result<T, AppBoundaryError>;
};

const partition = <T>(
  outcomes: SymbolOutcome<T>[],
): { values: T[]; excluded: ExcludedEntry[] } => {
  const values: T[] = [];
  const excluded: ExcludedEntry[] = [];

  for (const outcome of outcomes) {
    if (outcome.result.isOk()) {
      values.push(outcome.result.value);
    } else {
      excluded.push({ subject: outcome.symbol, error: outcome.result.error });
    }
  }

  return { values, excluded };
};

const normalizeSymbols = (symbols: string[]): string[] =>
  symbols.map((symbol) => symbol.trim().toUpperCase()).filter(Boolean);

/**
 * Gathers per-symbol series for a chart request; one failing symbol is excluded and never aborts the rest.
 */
export class ChartDataService {
  constructor(
    private readonly metricFetcher: MetricFetcherPort,
    private readonly peerResolver: PeerResolverPort,
    private readonly industryCatalog: IndustryCatalogPort,
    private readonly peerGrouping: PeerGrouping = "sector",
  ) {}

  /**
   * Replaces a lone symbol with its peer group; any other list passes through without a peer query.
   */
  async expandSymbols(
    symbols: string[],
  ): Promise<Result<string[], AppBoundaryError>> {
    const normalized = normalizeSymbols(symbols);
    const [single] = normalized;

    // Only a one-element request expands; blank entries still count toward the length.
    if (symbols.length !== 1 || single === undefined) {
      return ok(normalized);
    }

    const peers = await this.peerResolver.fetchPeers({
      symbol: single,
      grouping: this.peerGrouping,
    });

    if (peers.isOk()) {
      logger.debug(
        { symbol: single, grouping: this.peerGrouping, peers: peers.value },
        "Expanded single symbol into peer group",
      );
    }

    return peers;
  }

  async collectSeries(
    metricName: string,
    symbols: string[],
  ): Promise<Result<SeriesCollection, AppBoundaryError>> {
    const expanded = await this.expandSymbols(symbols);
    if (expanded.isErr()) {
      return err(expanded.error);
    }

    const outcomes: SymbolOutcome<MetricSeries>[] = [];
    for (const symbol of expanded.value) {
      outcomes.push({
        symbol,
        result: await this.metricFetcher.fetchSeries({ symbol, metricName }),
      });
    }

    const { values, excluded } = partition(outcomes);
    this.logExclusions(metricName, excluded);

    return ok({
      metricName,
      symbols: expanded.value,
      series: values,
      excluded,
    });
  }

  /**
   * Fetches both metrics per symbol; a symbol stays only when each of them yields a series.
   */
  async collectPairs(
    metricX: string,
    metricY: string,
    symbols: string[],
  ): Promise<Result<PairCollection, AppBoundaryError>> {
    const expanded = await this.expandSymbols(symbols);
    if (expanded.isErr()) {
      return err(expanded.error);
    }

    const outcomes: SymbolOutcome<LatestPair>[] = [];
    for (const symbol of expanded.value) {
      const x = await this.metricFetcher.fetchSeries({
        symbol,
        metricName: metricX,
      });
      if (x.isErr()) {
        outcomes.push({ symbol, result: err(x.error) });
        continue;
      }

      const y = await this.metricFetcher.fetchSeries({
        symbol,
        metricName: metricY,
      });
      outcomes.push({
        symbol,
        result: y.map((ySeries) => ({ symbol, x: x.value, y: ySeries })),
      });
    }

    const { values, excluded } = partition(outcomes);
    this.logExclusions(`${metricY} vs ${metricX}`, excluded);

    return ok({
      metricX,
      metricY,
      symbols: expanded.value,
      pairs: values,
      excluded,
    });
  }

  /**
   * Resolves each industry through the static catalog rather than peer lookup; unknown industries are skipped.
   */
  async collectIndustries(
    metricName: string,
    industries: string[],
  ): Promise<IndustryCollection> {
    const collected: IndustrySeries[] = [];
    const excluded: ExcludedEntry[] = [];

    for (const industry of industries) {
      const symbols = this.industryCatalog.symbolsFor(industry);
      if (symbols.isErr()) {
        excluded.push({ subject: industry, error: symbols.error });
        continue;
      }

      const outcomes: SymbolOutcome<MetricSeries>[] = [];
      for (const symbol of symbols.value) {
        outcomes.push({
          symbol,
          result: await this.metricFetcher.fetchSeries({ symbol, metricName }),
        });
      }

      const partitioned = partition(outcomes);
      collected.push({ industry, series: partitioned.values });
      excluded.push(...partitioned.excluded);
    }

    this.logExclusions(metricName, excluded);

    return { metricName, industries: collected, excluded };
  }

  private logExclusions(label: string, excluded: ExcludedEntry[]): void {
    if (excluded.length === 0) {
      return;
    }

    logger.info(
      {
        metric: label,
        excluded: excluded.map((entry) => ({
          subject: entry.subject,
          code: entry.error.code,
          reason: entry.error.reason,
        })),
      },
      "Excluded entries without usable data",
    );
  }
}
