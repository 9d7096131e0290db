import { readFileSync } from "node:fs";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { IndustryCatalogPort } from "../../../core/ports/inboundPorts";

const catalogSchema = z.record(z.string(), z.array(z.string()));

/**
 * Static industry-to-symbols grouping used when a chart compares whole industries.
 */
export class IndustryCatalog implements IndustryCatalogPort {
  private readonly groups: ReadonlyMap<string, readonly string[]>;

  constructor(groups: Record<string, string[]>) {
    this.groups = new Map(
      Object.entries(groups).map(([industry, symbols]) => [
        industry,
        symbols.map((symbol) => symbol.trim().toUpperCase()).filter(Boolean),
      ]),
    );
  }

  static fromFile(path: string): IndustryCatalog {
    let payload: unknown;
    try {
      payload = JSON.parse(readFileSync(path, "utf8"));
    } catch (error) {
      throw new Error(`Unable to read industry catalog at ${path}.`, {
        cause: error,
      });
    }

    const parsed = catalogSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Industry catalog is malformed: ${parsed.error.message}`);
    }

    return new IndustryCatalog(parsed.data);
  }

  industries(): string[] {
    return [...this.groups.keys()];
  }

  symbolsFor(industry: string): Result<string[], AppBoundaryError> {
    const symbols = this.groups.get(industry);
    if (!symbols) {
      return err({
        source: "industries",
        code: "not_found",
        reason: "unknown_industry",
        provider: "industry-catalog",
        message: `Industry '${industry}' is not in the industry catalog.`,
      });
    }

    return ok([...symbols]);
  }
}
