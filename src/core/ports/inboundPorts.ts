import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyIdentity } from "../entities/company";
import type { MetricSeries, PeerGrouping } from "../entities/metric";

export interface IdentifierResolverPort {
  resolve(symbol: string): Result<CompanyIdentity, AppBoundaryError>;
}

export type MetricRequest = {
  symbol: string;
  metricName: string;
};

export interface MetricFetcherPort {
  fetchSeries(
    request: MetricRequest,
  ): Promise<Result<MetricSeries, AppBoundaryError>>;
}

export type PeersRequest = {
  symbol: string;
  grouping: PeerGrouping;
};

export interface PeerResolverPort {
  fetchPeers(request: PeersRequest): Promise<Result<string[], AppBoundaryError>>;
}

export interface IndustryCatalogPort {
  symbolsFor(industry: string): Result<string[], AppBoundaryError>;
  industries(): string[];
}
