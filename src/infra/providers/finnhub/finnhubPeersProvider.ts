import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  AppBoundaryError,
  AppBoundaryFailureReason,
} from "../../../core/entities/appError";
import type {
  PeerResolverPort,
  PeersRequest,
} from "../../../core/ports/inboundPorts";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { toFailureReason } from "../utils/httpFailure";

const peersSchema = z.array(z.string());

/**
 * Looks up companies Finnhub groups with a symbol by sector, industry or sub-industry.
 */
export class FinnhubPeersProvider implements PeerResolverPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  /**
   * Returns the provider's list untouched, including the queried symbol when Finnhub lists it.
   */
  async fetchPeers(
    request: PeersRequest,
  ): Promise<Result<string[], AppBoundaryError>> {
    const symbol = request.symbol.trim().toUpperCase();

    if (!this.apiKey.trim()) {
      return err(
        this.toBoundaryError(
          symbol,
          "config_invalid",
          "FINNHUB_API_KEY is required to look up peer companies.",
        ),
      );
    }

    const url = new URL("/api/v1/stock/peers", this.baseUrl);
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("grouping", request.grouping);

    const payloadResult = await this.httpClient.getJson({
      url: url.toString(),
      timeoutMs: this.timeoutMs,
      headers: {
        "X-Finnhub-Token": this.apiKey,
      },
    });

    if (payloadResult.isErr()) {
      return err(
        this.toBoundaryError(
          symbol,
          toFailureReason(payloadResult.error),
          payloadResult.error.message,
          payloadResult.error.httpStatus,
        ),
      );
    }

    const peers = peersSchema.safeParse(payloadResult.value);
    if (!peers.success) {
      return err(
        this.toBoundaryError(
          symbol,
          "malformed_response",
          "Finnhub peers response was not an array of symbols.",
        ),
      );
    }

    return ok(peers.data);
  }

  private toBoundaryError(
    symbol: string,
    reason: AppBoundaryFailureReason,
    message: string,
    httpStatus?: number,
  ): AppBoundaryError {
    return {
      source: "peers",
      code: "no_peers",
      reason,
      provider: "finnhub",
      message,
      symbol,
      httpStatus,
    };
  }
}
