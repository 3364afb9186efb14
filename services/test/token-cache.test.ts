import { describe, expect, it, vi } from "vitest";

import { AuthConfigError, AuthRequestError, AuthResponseError } from "@/lib/errors";
import { AppAccessTokenCache, type FetchFn, resolveExpiry } from "@/lib/seatalk/token-cache";

const TOKEN_URL = "https://seatalk.test/auth/app_access_token";
const T0 = Date.UTC(2026, 0, 1);
const T0_SECONDS = T0 / 1000;

function jsonReply(body: unknown, status = 200, contentType = "application/json") {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": contentType } });
}

function setup(reply: () => Response) {
  let current = T0;
  const fetchFn = vi.fn<FetchFn>(async () => reply());
  const cache = new AppAccessTokenCache({
    tokenUrl: TOKEN_URL,
    appId: "test-app",
    appSecret: "test-secret",
    fetchFn,
    now: () => current,
  });
  return {
    cache,
    fetchFn,
    advance: (seconds: number) => {
      current += seconds * 1000;
    },
  };
}

describe("AppAccessTokenCache", () => {
  it("posts the app credentials to the token endpoint", async () => {
    const { cache, fetchFn } = setup(() => jsonReply({ code: 0, app_access_token: "tok-1", expire: T0_SECONDS + 7200 }));

    await expect(cache.getToken()).resolves.toBe("tok-1");

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(TOKEN_URL);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({ app_id: "test-app", app_secret: "test-secret" });
  });

  it("reuses the token until it is within 60 seconds of an absolute expiry", async () => {
    let issued = 0;
    const { cache, fetchFn, advance } = setup(() => {
      issued += 1;
      return jsonReply({ app_access_token: `tok-${issued}`, expire: T0_SECONDS + 7200 });
    });

    expect(await cache.getToken()).toBe("tok-1");
    advance(7200 - 61);
    expect(await cache.getToken()).toBe("tok-1");
    expect(fetchFn).toHaveBeenCalledTimes(1);

    advance(2);
    expect(await cache.getToken()).toBe("tok-2");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("treats a small expires_in as a lifetime", async () => {
    let issued = 0;
    const { cache, fetchFn, advance } = setup(() => {
      issued += 1;
      return jsonReply({ access_token: `tok-${issued}`, expires_in: 3600 });
    });

    await cache.getToken();
    advance(3539);
    expect(await cache.getToken()).toBe("tok-1");
    advance(2);
    expect(await cache.getToken()).toBe("tok-2");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("fails without credentials and makes no request", async () => {
    const fetchFn = vi.fn<FetchFn>();
    const cache = new AppAccessTokenCache({ tokenUrl: TOKEN_URL, appId: "test-app", fetchFn });

    await expect(cache.getToken()).rejects.toBeInstanceOf(AuthConfigError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("rejects a non-200 status", async () => {
    const { cache } = setup(() => jsonReply({ message: "denied" }, 401));
    await expect(cache.getToken()).rejects.toBeInstanceOf(AuthRequestError);
  });

  it("rejects a non-JSON content type", async () => {
    const { cache } = setup(() => new Response("<html></html>", { status: 200, headers: { "content-type": "text/html" } }));
    await expect(cache.getToken()).rejects.toBeInstanceOf(AuthRequestError);
  });

  it("rejects a body without a token", async () => {
    const { cache } = setup(() => jsonReply({ code: 2, message: "invalid app" }));
    await expect(cache.getToken()).rejects.toBeInstanceOf(AuthResponseError);
  });

  it("rejects a body that is not JSON", async () => {
    const { cache } = setup(() => new Response("{oops", { status: 200, headers: { "content-type": "application/json" } }));
    await expect(cache.getToken()).rejects.toBeInstanceOf(AuthResponseError);
  });
});

describe("resolveExpiry", () => {
  it("defaults to one hour", () => {
    expect(resolveExpiry(undefined, T0)).toBe(T0 + 3_600_000);
  });

  it("reads epoch seconds as absolute", () => {
    expect(resolveExpiry(T0_SECONDS + 10, T0)).toBe(T0 + 10_000);
  });
});
