import { ChartDataService } from "../services/chartDataService";
import { ChartRequestService } from "../services/chartRequestService";
import { env as processEnv, type AppEnv } from "../../shared/config/env";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { CompanyIdentifierResolver } from "../../infra/providers/company/companyIdentifierResolver";
import { IndustryCatalog } from "../../infra/providers/company/industryCatalog";
import { FinnhubPeersProvider } from "../../infra/providers/finnhub/finnhubPeersProvider";
import { SecCompanyFactsProvider } from "../../infra/providers/sec/secCompanyFactsProvider";
import { HtmlChartRenderer } from "../../infra/render/htmlChartRenderer";

/**
 * Builds only the Finnhub adapter, so peer lookups need neither SEC settings nor the catalogs.
 */
export const createPeerResolver = (
  appEnv: AppEnv = processEnv,
  httpClient = new HttpJsonClient(),
): FinnhubPeersProvider =>
  new FinnhubPeersProvider(
    appEnv.FINNHUB_BASE_URL,
    appEnv.FINNHUB_API_KEY,
    appEnv.FINNHUB_TIMEOUT_MS,
    httpClient,
  );

/**
 * Centralizes runtime wiring so every CLI command shares one composition root built from one immutable config.
 */
export const createRuntime = (appEnv: AppEnv = processEnv) => {
  const httpClient = new HttpJsonClient();

  const identifierResolver = CompanyIdentifierResolver.fromFile(
    appEnv.COMPANY_CATALOG_PATH,
  );
  const industryCatalog = IndustryCatalog.fromFile(appEnv.INDUSTRY_CATALOG_PATH);

  const metricFetcher = new SecCompanyFactsProvider(
    identifierResolver,
    appEnv.SEC_EDGAR_BASE_URL,
    appEnv.SEC_EDGAR_USER_AGENT,
    appEnv.SEC_EDGAR_TIMEOUT_MS,
    httpClient,
  );
  const peerResolver = createPeerResolver(appEnv, httpClient);

  const chartDataService = new ChartDataService(
    metricFetcher,
    peerResolver,
    industryCatalog,
    appEnv.PEER_GROUPING,
  );
  const chartRequestService = new ChartRequestService(
    chartDataService,
    new HtmlChartRenderer(appEnv.CHART_OUTPUT_DIR),
  );

  return Object.freeze({
    identifierResolver,
    industryCatalog,
    metricFetcher,
    peerResolver,
    chartDataService,
    chartRequestService,
  });
};

export type Runtime = ReturnType<typeof createRuntime>;
