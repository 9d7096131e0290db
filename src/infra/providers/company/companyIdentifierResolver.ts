import { readFileSync } from "node:fs";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyIdentity } from "../../../core/entities/company";
import type { IdentifierResolverPort } from "../../../core/ports/inboundPorts";

const cikSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d{1,10}$/),
]);

// Layout of SEC's company_tickers_exchange.json: rows of [cik, name, ticker, exchange].
const catalogSchema = z.object({
  data: z.array(
    z.tuple([
      cikSchema,
      z.string().nullable(),
      z.string().nullable(),
      z.string().nullable(),
    ]),
  ),
});

const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();

/**
 * Resolves ticker symbols to SEC CIK identifiers from a catalog loaded once at startup.
 */
export class CompanyIdentifierResolver implements IdentifierResolverPort {
  private readonly bySymbol: ReadonlyMap<string, CompanyIdentity>;

  constructor(identities: Iterable<CompanyIdentity>) {
    const bySymbol = new Map<string, CompanyIdentity>();
    for (const identity of identities) {
      // Later rows replace earlier ones for the same symbol.
      bySymbol.set(normalizeSymbol(identity.symbol), identity);
    }
    this.bySymbol = bySymbol;
  }

  /**
   * Builds the resolver from a parsed catalog document; throws when the shape does not match.
   */
  static fromPayload(payload: unknown): CompanyIdentifierResolver {
    const parsed = catalogSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(
        `Company identifier catalog is malformed: ${parsed.error.message}`,
      );
    }

    const identities: CompanyIdentity[] = [];
    for (const [cik, name, ticker, exchange] of parsed.data.data) {
      const symbol = ticker?.trim();
      if (!symbol) {
        continue;
      }

      identities.push({
        cik: String(Number(cik)),
        name: name?.trim() || symbol,
        symbol: normalizeSymbol(symbol),
        exchange: exchange ?? undefined,
      });
    }

    return new CompanyIdentifierResolver(identities);
  }

  static fromFile(path: string): CompanyIdentifierResolver {
    let payload: unknown;
    try {
      payload = JSON.parse(readFileSync(path, "utf8"));
    } catch (error) {
      throw new Error(`Unable to read company identifier catalog at ${path}.`, {
        cause: error,
      });
    }

    return CompanyIdentifierResolver.fromPayload(payload);
  }

  get size(): number {
    return this.bySymbol.size;
  }

  resolve(symbol: string): Result<CompanyIdentity, AppBoundaryError> {
    const normalized = normalizeSymbol(symbol);
    const identity = this.bySymbol.get(normalized);

    if (!identity) {
      return err({
        source: "identifiers",
        code: "not_found",
        reason: "unknown_symbol",
        provider: "company-catalog",
        message: `Symbol '${normalized}' is not in the company identifier catalog.`,
        symbol: normalized,
      });
    }

    return ok(identity);
  }
}
