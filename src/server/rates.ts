import { ShareGateError } from "../lib/errors.js";

export const RATES_URL =
  "https://api.fiscaldata.treasury.gov/services/api/fiscal_service/v2/accounting/od/avg_interest_rates?page[number]=1&page[size]=10";
export const RATES_TIMEOUT_MS = 10_000;

export interface RatesErrorBody {
  status: "error";
  code: number;
  message: string;
}

export interface FetchRatesOptions {
  url?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function ratesError(code: number, message: string): RatesErrorBody {
  return { status: "error", code, message };
}

/**
 * Returns the upstream JSON verbatim on 200 and an error body for any other
 * status. Transport failures throw RATES_TIMEOUT or RATES_UNAVAILABLE.
 */
export async function fetchRates(options: FetchRatesOptions = {}): Promise<unknown> {
  const url = options.url ?? RATES_URL;
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? RATES_TIMEOUT_MS);

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: { "Content-Type": "application/json" },
      signal: controller.signal,
    });

    if (response.status !== 200) {
      return ratesError(response.status, "Failed to fetch rates from Treasury API");
    }

    return await response.json();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new ShareGateError("RATES_TIMEOUT", "Rates request timed out", {
        status: 504,
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new ShareGateError("RATES_UNAVAILABLE", `Rates request failed: ${message}`, {
      status: 502,
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }
}
