import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  AppBoundaryError,
  AppBoundaryFailureReason,
} from "../../../core/entities/appError";
import type {
  MetricPoint,
  MetricSeries,
  ReportRecord,
} from "../../../core/entities/metric";
import type {
  IdentifierResolverPort,
  MetricFetcherPort,
  MetricRequest,
} from "../../../core/ports/inboundPorts";
import { logger } from "../../../shared/logger/logger";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { toFailureReason } from "../utils/httpFailure";

export const GAAP_TAXONOMY = "us-gaap";
export const QUARTERLY_FORM = "10-Q";

const companyFactsSchema = z.object({
  facts: z.record(z.string(), z.unknown()),
});

const taxonomySchema = z.record(z.string(), z.unknown());

const conceptSchema = z.object({
  units: z.record(z.string(), z.unknown()),
});

const reportRecordSchema = z.object({
  end: z.string(),
  val: z.number(),
  form: z.string(),
  frame: z.string().nullish(),
  fy: z.number().nullish(),
  fp: z.string().nullish(),
  filed: z.string().optional(),
  accn: z.string().optional(),
});

const reportRecordsSchema = z.array(reportRecordSchema);

type FramedReportRecord = ReportRecord & { frame: string };

const isQuarterlyFramed = (
  record: ReportRecord,
): record is FramedReportRecord =>
  record.form === QUARTERLY_FORM && typeof record.frame === "string";

/**
 * Keeps 10-Q rows that carry a standardized frame, in their original order.
 */
export const filterQuarterlyFramed = (
  records: readonly ReportRecord[],
): FramedReportRecord[] => records.filter(isQuarterlyFramed);

/**
 * Picks the first unit in document order; metrics reported in several units lose the others.
 */
export const selectUnit = (
  units: Record<string, unknown>,
): string | undefined => Object.keys(units)[0];

const toPoint = (record: FramedReportRecord): MetricPoint => ({
  end: record.end,
  value: record.val,
  frame: record.frame,
});

type SeriesFailure = {
  reason: AppBoundaryFailureReason;
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Reads one metric out of SEC XBRL company facts and shapes it into a quarterly series.
 */
export class SecCompanyFactsProvider implements MetricFetcherPort {
  constructor(
    private readonly identifiers: IdentifierResolverPort,
    private readonly baseUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required to request SEC company facts.",
      );
    }
  }

  /**
   * Collapses every failure into one no-data outcome and logs which symbol and metric were dropped.
   */
  async fetchSeries(
    request: MetricRequest,
  ): Promise<Result<MetricSeries, AppBoundaryError>> {
    const symbol = request.symbol.trim().toUpperCase();
    const result = await this.loadSeries(symbol, request.metricName);

    if (result.isErr()) {
      const failure = result.error;
      logger.warn(
        {
          symbol,
          metricName: request.metricName,
          reason: failure.reason,
          httpStatus: failure.httpStatus,
        },
        `${symbol} has no ${request.metricName}`,
      );

      return err({
        source: "filings",
        code: "no_data",
        provider: "sec-edgar",
        symbol,
        metricName: request.metricName,
        ...failure,
      });
    }

    return ok(result.value);
  }

  private async loadSeries(
    symbol: string,
    metricName: string,
  ): Promise<Result<MetricSeries, SeriesFailure>> {
    const identity = this.identifiers.resolve(symbol);
    if (identity.isErr()) {
      return err({
        reason: identity.error.reason,
        message: identity.error.message,
      });
    }

    const cik = identity.value.cik.padStart(10, "0");
    const url = new URL(
      `/api/xbrl/companyfacts/CIK${cik}.json`,
      this.baseUrl,
    ).toString();

    const response = await this.httpClient.getJson({
      url,
      timeoutMs: this.timeoutMs,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      return err({
        reason: toFailureReason(response.error),
        message: response.error.message,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    return this.toSeries(symbol, metricName, response.value);
  }

  private toSeries(
    symbol: string,
    metricName: string,
    payload: unknown,
  ): Result<MetricSeries, SeriesFailure> {
    const companyFacts = companyFactsSchema.safeParse(payload);
    if (!companyFacts.success) {
      return err({
        reason: "malformed_response",
        message: "SEC company facts payload has no facts object.",
        cause: companyFacts.error,
      });
    }

    const taxonomy = taxonomySchema.safeParse(
      companyFacts.data.facts[GAAP_TAXONOMY],
    );
    if (!taxonomy.success) {
      return err({
        reason: "missing_taxonomy",
        message: `SEC company facts have no ${GAAP_TAXONOMY} namespace.`,
      });
    }

    if (!Object.hasOwn(taxonomy.data, metricName)) {
      return err({
        reason: "missing_metric",
        message: `${metricName} is not reported under ${GAAP_TAXONOMY}.`,
      });
    }

    const concept = conceptSchema.safeParse(taxonomy.data[metricName]);
    if (!concept.success) {
      return err({
        reason: "malformed_response",
        message: `${metricName} has no units mapping.`,
        cause: concept.error,
      });
    }

    const unit = selectUnit(concept.data.units);
    if (unit === undefined) {
      return err({
        reason: "empty_series",
        message: `${metricName} is reported without any unit.`,
      });
    }

    const records = reportRecordsSchema.safeParse(concept.data.units[unit]);
    if (!records.success) {
      return err({
        reason: "malformed_response",
        message: `${metricName} records under ${unit} do not match the report record shape.`,
        cause: records.error,
      });
    }

    const points = filterQuarterlyFramed(records.data).map(toPoint);
    if (points.length === 0) {
      return err({
        reason: "empty_series",
        message: `${metricName} has no framed ${QUARTERLY_FORM} records under ${unit}.`,
      });
    }

    return ok({ symbol, metricName, unit, points });
  }
}
