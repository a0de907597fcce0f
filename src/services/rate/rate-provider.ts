import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { RateProviderError } from "../../utils/error";
import { withAbortableTimeout } from "../../utils/resilience/timeout.util";

export interface RateProvider {
  /** Base annual rate in percent. */
  getAnnualRate(signal?: AbortSignal): Promise<number>;
}

const rateResponseSchema = z.union([
  z.object({ rate: z.number() }).transform((b) => b.rate),
  z.object({ keyRate: z.number() }).transform((b) => b.keyRate),
]);

export type HttpRateProviderConfig = {
  url: string;
  timeoutMs: number;
  client?: AxiosInstance;
};

/** GETs the base rate as JSON: `{ "rate": 16 }` or `{ "keyRate": 16 }`. */
export class HttpRateProvider implements RateProvider {
  private readonly client: AxiosInstance;

  constructor(private readonly config: HttpRateProviderConfig) {
    this.client = config.client ?? axios.create();
  }

  async getAnnualRate(signal?: AbortSignal): Promise<number> {
    let body: unknown;
    try {
      const response = await withAbortableTimeout(
        (abort) =>
          this.client.get<unknown>(this.config.url, {
            signal: abort,
            timeout: this.config.timeoutMs,
            headers: { Accept: "application/json" },
          }),
        this.config.timeoutMs,
        { label: "Rate provider request", signal }
      );
      body = response.data;
    } catch (error) {
      throw new RateProviderError("Rate provider request failed", error);
    }

    const parsed = rateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RateProviderError("Rate provider returned a malformed payload", parsed.error);
    }

    const rate = parsed.data;
    if (!Number.isFinite(rate) || rate < 0) {
      throw new RateProviderError(`Rate provider returned an invalid rate: ${rate}`);
    }
    return rate;
  }
}

export class FixedRateProvider implements RateProvider {
  constructor(private readonly rate: number) {}

  async getAnnualRate(): Promise<number> {
    return this.rate;
  }
}
