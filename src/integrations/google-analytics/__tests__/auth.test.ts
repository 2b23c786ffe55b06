import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import type { Credentials } from "google-auth-library";
import {
  browserOpenCommand,
  createBrowserAuthorizer,
  createCredentialProvider,
  isTokenFresh,
  readCachedToken,
  readClientSecrets,
  startLoopbackListener,
  type ClientSecrets,
  type ConsentClient,
  type TokenClient,
} from "../auth";
import { GA_SCOPES } from "../config";

const NOW = Date.parse("2024-01-08T06:00:00Z");
const HOUR = 60 * 60 * 1000;

const installedSecrets = {
  installed: {
    client_id: "test-client-id.apps.googleusercontent.com",
    client_secret: "test-client-secret",
    redirect_uris: ["http://localhost"],
  },
};

function createFakeClient(refreshed: Credentials) {
  const client: TokenClient = {
    credentials: {},
    setCredentials: vi.fn((credentials: Credentials) => {
      client.credentials = credentials;
    }),
    getAccessToken: vi.fn(async () => {
      client.credentials = { ...client.credentials, ...refreshed };
      return { token: refreshed.access_token };
    }),
  };
  return client;
}

describe("Google Analytics credentials", () => {
  let dir: string;
  let tokenPath: string;
  let secretsPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "analytics-sync-auth-"));
    tokenPath = path.join(dir, "cache", "analytics_token.json");
    secretsPath = path.join(dir, "client_secret.json");
    fs.writeFileSync(secretsPath, JSON.stringify(installedSecrets));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeToken(token: object) {
    fs.mkdirSync(path.dirname(tokenPath), { recursive: true });
    fs.writeFileSync(tokenPath, JSON.stringify(token));
  }

  function readToken(): unknown {
    return JSON.parse(fs.readFileSync(tokenPath, "utf8"));
  }

  describe("createCredentialProvider", () => {
    it("should reuse a fresh cached token without touching the OAuth client", async () => {
      writeToken({ access_token: "test-cached-token", expiry_date: NOW + HOUR });
      const createClient = vi.fn();
      const authorize = vi.fn();

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        createClient,
        authorize,
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).resolves.toBe("test-cached-token");
      expect(createClient).not.toHaveBeenCalled();
      expect(authorize).not.toHaveBeenCalled();
    });

    it("should refresh an expired token and persist the result", async () => {
      writeToken({
        access_token: "test-expired-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW - 1000,
      });
      const client = createFakeClient({
        access_token: "test-new-token",
        expiry_date: NOW + HOUR,
      });
      const createClient = vi.fn(() => client);
      const authorize = vi.fn();

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        createClient,
        authorize,
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).resolves.toBe("test-new-token");
      expect(createClient).toHaveBeenCalledWith({
        clientId: "test-client-id.apps.googleusercontent.com",
        clientSecret: "test-client-secret",
      });
      expect(client.setCredentials).toHaveBeenCalledWith({
        access_token: "test-expired-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW - 1000,
      });
      expect(authorize).not.toHaveBeenCalled();
      expect(readToken()).toEqual({
        access_token: "test-new-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW + HOUR,
      });
    });

    it("should refresh a token that expires within the skew window", async () => {
      writeToken({
        access_token: "test-expiring-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW + 60 * 1000,
      });
      const client = createFakeClient({ access_token: "test-new-token", expiry_date: NOW + HOUR });

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        createClient: () => client,
        authorize: vi.fn(),
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).resolves.toBe("test-new-token");
    });

    it("should run the browser flow when there is no cached token", async () => {
      const authorize = vi.fn(async () => ({
        access_token: "test-authorized-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW + HOUR,
        scope: GA_SCOPES[0],
        token_type: "Bearer",
      }));

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        authorize,
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).resolves.toBe("test-authorized-token");
      expect(authorize).toHaveBeenCalledTimes(1);
      expect(authorize).toHaveBeenCalledWith(
        {
          clientId: "test-client-id.apps.googleusercontent.com",
          clientSecret: "test-client-secret",
        },
        GA_SCOPES,
        expect.any(Function)
      );
      expect(readToken()).toEqual({
        access_token: "test-authorized-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW + HOUR,
        scope: "https://www.googleapis.com/auth/analytics.readonly",
        token_type: "Bearer",
      });
    });

    it("should run the browser flow when an expired token cannot be refreshed", async () => {
      writeToken({ access_token: "test-expired-token", expiry_date: NOW - HOUR });
      const createClient = vi.fn();
      const authorize = vi.fn(async () => ({
        access_token: "test-authorized-token",
        expiry_date: NOW + HOUR,
      }));

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        createClient,
        authorize,
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).resolves.toBe("test-authorized-token");
      expect(createClient).not.toHaveBeenCalled();
    });

    it("should keep the token in memory across calls", async () => {
      const authorize = vi.fn(async () => ({
        access_token: "test-authorized-token",
        expiry_date: NOW + HOUR,
      }));

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        authorize,
        now: () => NOW,
        log: () => {},
      });

      await provider.getAccessToken();
      await provider.getAccessToken();
      await provider.getAccessToken();

      expect(authorize).toHaveBeenCalledTimes(1);
    });

    it("should refresh again once the in-memory token expires", async () => {
      let now = NOW;
      writeToken({
        access_token: "test-cached-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW + HOUR,
      });
      const client = createFakeClient({
        access_token: "test-new-token",
        expiry_date: NOW + 3 * HOUR,
      });
      const createClient = vi.fn(() => client);

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        createClient,
        authorize: vi.fn(),
        now: () => now,
        log: () => {},
      });

      await expect(provider.getAccessToken()).resolves.toBe("test-cached-token");
      now = NOW + 2 * HOUR;
      await expect(provider.getAccessToken()).resolves.toBe("test-new-token");
      expect(createClient).toHaveBeenCalledTimes(1);
    });

    it("should propagate authorization failures and leave the cache alone", async () => {
      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        authorize: vi.fn(async () => {
          throw new Error("Authorization failed: access_denied");
        }),
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).rejects.toThrow(
        "Authorization failed: access_denied"
      );
      expect(fs.existsSync(tokenPath)).toBe(false);
    });

    it("should fail when a refresh yields no access token", async () => {
      writeToken({ refresh_token: "test-refresh-token" });
      const client = createFakeClient({});

      const provider = createCredentialProvider({
        tokenPath,
        clientSecretsFile: secretsPath,
        createClient: () => client,
        authorize: vi.fn(),
        now: () => NOW,
        log: () => {},
      });

      await expect(provider.getAccessToken()).rejects.toThrow(
        "Token refresh did not return an access token"
      );
    });
  });

  describe("readCachedToken", () => {
    it("should return null when the cache file does not exist", () => {
      expect(readCachedToken(tokenPath)).toBeNull();
    });

    it("should read the authorized-user layout", () => {
      writeToken({
        token: "test-cached-token",
        refresh_token: "test-refresh-token",
        expiry: "2024-01-08T07:00:00Z",
        client_id: "test-client-id",
      });

      expect(readCachedToken(tokenPath)).toEqual({
        access_token: "test-cached-token",
        refresh_token: "test-refresh-token",
        expiry_date: NOW + HOUR,
      });
    });

    it("should reject a file that is not a JSON object", () => {
      writeToken(["not", "an", "object"]);
      expect(() => readCachedToken(tokenPath)).toThrow("does not contain a JSON object");
    });
  });

  describe("readClientSecrets", () => {
    it("should read the installed app layout", () => {
      expect(readClientSecrets(secretsPath)).toEqual({
        clientId: "test-client-id.apps.googleusercontent.com",
        clientSecret: "test-client-secret",
      });
    });

    it("should read the web app layout", () => {
      fs.writeFileSync(
        secretsPath,
        JSON.stringify({ web: { client_id: "test-web-id", client_secret: "test-web-secret" } })
      );
      expect(readClientSecrets(secretsPath)).toEqual({
        clientId: "test-web-id",
        clientSecret: "test-web-secret",
      });
    });

    it("should reject a file without either section", () => {
      fs.writeFileSync(secretsPath, JSON.stringify({ client_id: "test-client-id" }));
      expect(() => readClientSecrets(secretsPath)).toThrow(
        'must contain an "installed" or "web" section'
      );
    });

    it("should reject a missing client secret", () => {
      fs.writeFileSync(secretsPath, JSON.stringify({ installed: { client_id: "test-client-id" } }));
      expect(() => readClientSecrets(secretsPath)).toThrow("client_secret is required");
    });
  });

  describe("isTokenFresh", () => {
    it("should need an access token", () => {
      expect(isTokenFresh({ refresh_token: "test-refresh-token" }, NOW)).toBe(false);
    });

    it("should accept a token without a recorded expiry", () => {
      expect(isTokenFresh({ access_token: "test-token" }, NOW)).toBe(true);
    });

    it("should treat the last five minutes before expiry as stale", () => {
      const fiveMinutes = 5 * 60 * 1000;
      expect(isTokenFresh({ access_token: "t", expiry_date: NOW + fiveMinutes + 1 }, NOW)).toBe(true);
      expect(isTokenFresh({ access_token: "t", expiry_date: NOW + fiveMinutes }, NOW)).toBe(false);
    });
  });

  describe("startLoopbackListener", () => {
    it("should resolve with the code from the redirect", async () => {
      const listener = await startLoopbackListener();
      try {
        expect(listener.redirectUri).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);

        const favicon = await fetch(`${listener.redirectUri}/favicon.ico`);
        expect(favicon.status).toBe(404);
        await favicon.text();

        const res = await fetch(`${listener.redirectUri}/?code=test-auth-code&scope=x`);
        expect(res.status).toBe(200);
        expect(await res.text()).toBe("Authorization complete. You can close this window.");
        await expect(listener.code).resolves.toBe("test-auth-code");
      } finally {
        listener.close();
      }
    });

    it("should reject when the user denies access", async () => {
      const listener = await startLoopbackListener();
      try {
        const outcome = expect(listener.code).rejects.toThrow(
          "Authorization failed: access_denied"
        );
        const res = await fetch(`${listener.redirectUri}/?error=access_denied`);
        expect(res.status).toBe(400);
        await res.text();
        await outcome;
      } finally {
        listener.close();
      }
    });
  });

  describe("browserOpenCommand", () => {
    const url = "https://accounts.example.test/o/oauth2/auth?a=1&b=2";

    it("should use open on macOS", () => {
      expect(browserOpenCommand(url, "darwin")).toEqual({ command: "open", args: [url] });
    });

    it("should hand the whole URL to the protocol handler on Windows", () => {
      expect(browserOpenCommand(url, "win32")).toEqual({
        command: "rundll32",
        args: ["url.dll,FileProtocolHandler", url],
      });
    });

    it("should use xdg-open elsewhere", () => {
      expect(browserOpenCommand(url, "linux")).toEqual({ command: "xdg-open", args: [url] });
    });
  });

  describe("createBrowserAuthorizer", () => {
    const secrets: ClientSecrets = {
      clientId: "test-client-id",
      clientSecret: "test-client-secret",
    };

    function createFakeConsentClient() {
      const getToken = vi.fn(async (code: string) => ({
        tokens: { access_token: `test-access-${code}`, refresh_token: "test-refresh-token" },
      }));
      const createClient = vi.fn(
        (_secrets: ClientSecrets, redirectUri: string): ConsentClient => ({
          generateAuthUrl: ({ scope }) =>
            `https://accounts.example.test/o/oauth2/auth?redirect_uri=${encodeURIComponent(
              redirectUri
            )}&scope=${encodeURIComponent(scope.join(" "))}`,
          getToken,
        })
      );
      return { createClient, getToken };
    }

    async function followRedirect(consentUrl: string, code: string) {
      const redirectUri = new URL(consentUrl).searchParams.get("redirect_uri") ?? "";
      const res = await fetch(`${redirectUri}/?code=${code}`);
      await res.text();
    }

    it("should open the consent page in the browser and exchange the returned code", async () => {
      const { createClient, getToken } = createFakeConsentClient();
      const exec = vi.fn(async (_command: string, args: string[]) => {
        await followRedirect(args[args.length - 1] ?? "", "test-auth-code");
      });
      const logs: string[] = [];

      const authorize = createBrowserAuthorizer({ exec, platform: "linux", createClient });
      const tokens = await authorize(secrets, GA_SCOPES, (line) => logs.push(line));

      expect(tokens).toEqual({
        access_token: "test-access-test-auth-code",
        refresh_token: "test-refresh-token",
      });
      expect(getToken).toHaveBeenCalledWith("test-auth-code");
      expect(exec).toHaveBeenCalledTimes(1);
      expect(exec).toHaveBeenCalledWith("xdg-open", [
        expect.stringMatching(/^https:\/\/accounts\.example\.test\/o\/oauth2\/auth\?redirect_uri=/),
      ]);
      expect(logs[2]).toBe(`  ${exec.mock.calls[0]?.[1][0]}`);
    });

    it("should fall back to the printed URL when no browser can be started", async () => {
      const { createClient } = createFakeConsentClient();
      const exec = vi.fn(async () => {
        throw new Error("spawn xdg-open ENOENT");
      });
      const logs: string[] = [];

      const authorize = createBrowserAuthorizer({ exec, platform: "linux", createClient });
      const pending = authorize(secrets, GA_SCOPES, (line) => logs.push(line));

      await vi.waitFor(() => {
        expect(logs).toContain(
          "[Auth] Could not open a browser (spawn xdg-open ENOENT), open the URL above manually"
        );
      });
      const printed = logs.find((line) => line.startsWith("  https://")) ?? "";
      await followRedirect(printed.trim(), "test-manual-code");

      await expect(pending).resolves.toEqual({
        access_token: "test-access-test-manual-code",
        refresh_token: "test-refresh-token",
      });
    });
  });
});
