import axios, { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { FixedRateProvider, HttpRateProvider } from "../rate-provider";
import { RateProviderError } from "../../../utils/error";

const URL = "http://rates.test/key-rate";

const respondWith =
  (data: unknown): AxiosAdapter =>
  async (config) => ({ data, status: 200, statusText: "OK", headers: {}, config });

const providerWith = (adapter: AxiosAdapter, timeoutMs = 1000) =>
  new HttpRateProvider({ url: URL, timeoutMs, client: axios.create({ adapter }) });

describe("HttpRateProvider", () => {
  test("reads { rate }", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const provider = providerWith(async (config) => {
      seen.push(config);
      return respondWith({ rate: 16 })(config);
    });

    await expect(provider.getAnnualRate()).resolves.toBe(16);
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe(URL);
    expect(seen[0].method).toBe("get");
  });

  test("reads { keyRate }", async () => {
    const provider = providerWith(respondWith({ keyRate: 7.25 }));
    await expect(provider.getAnnualRate()).resolves.toBe(7.25);
  });

  test.each<[string, unknown]>([
    ["a missing field", { value: 16 }],
    ["a string rate", { rate: "16" }],
    ["a non-object body", "16%"],
  ])("rejects %s", async (_name, body) => {
    const provider = providerWith(respondWith(body));
    await expect(provider.getAnnualRate()).rejects.toBeInstanceOf(RateProviderError);
  });

  test("rejects a negative rate", async () => {
    const provider = providerWith(respondWith({ rate: -1 }));
    await expect(provider.getAnnualRate()).rejects.toThrow(
      "Rate provider returned an invalid rate: -1"
    );
  });

  test("wraps transport failures", async () => {
    const cause = new Error("socket hang up");
    const provider = providerWith(async () => {
      throw cause;
    });

    const error = await provider.getAnnualRate().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateProviderError);
    expect(error).toMatchObject({ code: "RATE_PROVIDER_ERROR", status: 502, cause });
  });

  test("aborts a request that outlives the timeout", async () => {
    const signals: Array<InternalAxiosRequestConfig["signal"]> = [];
    const provider = providerWith((config) => {
      signals.push(config.signal);
      return new Promise<never>(() => undefined);
    }, 10);

    await expect(provider.getAnnualRate()).rejects.toBeInstanceOf(RateProviderError);
    expect(signals[0]?.aborted).toBe(true);
  });
});

describe("FixedRateProvider", () => {
  test("returns its rate", async () => {
    await expect(new FixedRateProvider(16).getAnnualRate()).resolves.toBe(16);
  });
});
