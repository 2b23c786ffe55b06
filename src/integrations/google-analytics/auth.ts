import { spawn } from "child_process";
import fs from "fs";
import http from "http";
import path from "path";
import { OAuth2Client, type Credentials } from "google-auth-library";
import { describeError, validateRequiredString } from "../../lib/security";
import type { AccessTokenProvider } from "../types";
import { GA_SCOPES, TOKEN_EXPIRY_SKEW_MS } from "./config";

// ─── Files ───────────────────────────────────────────────────────────────────

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Read an OAuth client secret file as downloaded from Google Cloud.
 * Both the "installed" (desktop app) and "web" layouts are accepted.
 */
export function readClientSecrets(
  filePath: string,
  fsImpl: typeof fs = fs
): ClientSecrets {
  const parsed: unknown = JSON.parse(fsImpl.readFileSync(filePath, "utf8"));
  const section = isRecord(parsed) ? parsed.installed ?? parsed.web : undefined;
  if (!isRecord(section)) {
    throw new Error(
      `Client secret file ${filePath} must contain an "installed" or "web" section`
    );
  }

  const clientId = section.client_id;
  const clientSecret = section.client_secret;
  const error =
    validateRequiredString("client_id", clientId) ??
    validateRequiredString("client_secret", clientSecret);
  if (error) {
    throw new Error(`Client secret file ${filePath} is invalid: ${error.message}`);
  }
  if (typeof clientId !== "string" || typeof clientSecret !== "string") {
    throw new Error(`Client secret file ${filePath} is invalid`);
  }

  return { clientId, clientSecret };
}

/**
 * Load the cached token, or null when there is none yet.
 *
 * Also reads the authorized-user layout other Google client libraries write
 * ("token" and an ISO "expiry"), so an existing cache keeps working.
 */
export function readCachedToken(
  tokenPath: string,
  fsImpl: typeof fs = fs
): Credentials | null {
  if (!fsImpl.existsSync(tokenPath)) return null;

  const parsed: unknown = JSON.parse(fsImpl.readFileSync(tokenPath, "utf8"));
  if (!isRecord(parsed)) {
    throw new Error(`Token file ${tokenPath} does not contain a JSON object`);
  }

  const credentials: Credentials = {};
  const accessToken = optionalString(parsed.access_token) ?? optionalString(parsed.token);
  if (accessToken) credentials.access_token = accessToken;

  const refreshToken = optionalString(parsed.refresh_token);
  if (refreshToken) credentials.refresh_token = refreshToken;

  if (typeof parsed.expiry_date === "number") {
    credentials.expiry_date = parsed.expiry_date;
  } else if (typeof parsed.expiry === "string" && !Number.isNaN(Date.parse(parsed.expiry))) {
    credentials.expiry_date = Date.parse(parsed.expiry);
  }

  const scope = optionalString(parsed.scope);
  if (scope) credentials.scope = scope;
  const tokenType = optionalString(parsed.token_type);
  if (tokenType) credentials.token_type = tokenType;

  return credentials;
}

export function writeCachedToken(
  tokenPath: string,
  credentials: Credentials,
  fsImpl: typeof fs = fs
): void {
  const dir = path.dirname(tokenPath);
  if (!fsImpl.existsSync(dir)) {
    fsImpl.mkdirSync(dir, { recursive: true });
  }
  fsImpl.writeFileSync(tokenPath, JSON.stringify(credentials, null, 2), {
    mode: 0o600,
  });
}

/**
 * A token is usable when it has an access token that is not about to expire.
 * Tokens without a recorded expiry are taken at their word.
 */
export function isTokenFresh(credentials: Credentials, nowMs: number): boolean {
  if (!credentials.access_token) return false;
  if (credentials.expiry_date === undefined || credentials.expiry_date === null) {
    return true;
  }
  return credentials.expiry_date - TOKEN_EXPIRY_SKEW_MS > nowMs;
}

// ─── Interactive authorization ───────────────────────────────────────────────

export interface LoopbackListener {
  redirectUri: string;
  /** Resolves with the authorization code from the first redirect that carries one */
  code: Promise<string>;
  close: () => void;
}

/**
 * Listen on an ephemeral loopback port for the OAuth redirect.
 */
export async function startLoopbackListener(): Promise<LoopbackListener> {
  const server = http.createServer();

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new Error("Could not determine the loopback port for authorization");
  }
  const redirectUri = `http://127.0.0.1:${address.port}`;

  const code = new Promise<string>((resolve, reject) => {
    server.on("request", (req, res) => {
      const url = new URL(req.url ?? "/", redirectUri);
      const denied = url.searchParams.get("error");
      const received = url.searchParams.get("code");

      if (denied) {
        res.writeHead(400, { "Content-Type": "text/plain" });
        res.end("Authorization was not granted. You can close this window.");
        reject(new Error(`Authorization failed: ${denied}`));
        return;
      }
      // Browsers also ask for /favicon.ico and the like
      if (!received) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("Authorization complete. You can close this window.");
      resolve(received);
    });
  });

  return {
    redirectUri,
    code,
    close: () => {
      server.close();
      server.closeAllConnections();
    },
  };
}

export type AuthorizeFn = (
  secrets: ClientSecrets,
  scopes: string[],
  log: (line: string) => void
) => Promise<Credentials>;

export interface ExecFn {
  (command: string, args: string[]): Promise<void>;
}

/**
 * Launch a detached command. Resolves once it has started; some openers
 * only return when the browser they started exits.
 */
function defaultExec(command: string, args: string[]) {
  return new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore", detached: true });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}

/**
 * The platform's "open this URL" command.
 */
export function browserOpenCommand(
  url: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  if (platform === "darwin") return { command: "open", args: [url] };
  // `start` would need cmd.exe, which splits the URL on "&"
  if (platform === "win32") {
    return { command: "rundll32", args: ["url.dll,FileProtocolHandler", url] };
  }
  return { command: "xdg-open", args: [url] };
}

/**
 * The subset of OAuth2Client the browser flow relies on.
 */
export interface ConsentClient {
  generateAuthUrl(options: { access_type: string; prompt: string; scope: string[] }): string;
  getToken(code: string): Promise<{ tokens: Credentials }>;
}

export interface BrowserAuthorizerOptions {
  exec?: ExecFn;
  platform?: NodeJS.Platform;
  createClient?: (secrets: ClientSecrets, redirectUri: string) => ConsentClient;
}

function defaultConsentClient(secrets: ClientSecrets, redirectUri: string): ConsentClient {
  return new OAuth2Client({
    clientId: secrets.clientId,
    clientSecret: secrets.clientSecret,
    redirectUri,
  });
}

/**
 * Installed-app flow: open the consent page in the default browser, wait for
 * Google to redirect back to the loopback listener, then exchange the code
 * for tokens. The URL is always printed too, for headless machines.
 */
export function createBrowserAuthorizer(
  options: BrowserAuthorizerOptions = {}
): AuthorizeFn {
  const exec = options.exec ?? defaultExec;
  const createClient = options.createClient ?? defaultConsentClient;

  return async (secrets, scopes, log) => {
    const listener = await startLoopbackListener();
    try {
      const client = createClient(secrets, listener.redirectUri);
      const authUrl = client.generateAuthUrl({
        access_type: "offline",
        prompt: "consent",
        scope: scopes,
      });

      log("Open this URL in a browser to authorize read access to Google Analytics:");
      log("");
      log(`  ${authUrl}`);
      log("");

      const openBrowser = async () => {
        const { command, args } = browserOpenCommand(authUrl, options.platform);
        try {
          await exec(command, args);
        } catch (error) {
          log(`[Auth] Could not open a browser (${describeError(error)}), open the URL above manually`);
        }
      };

      const [code] = await Promise.all([listener.code, openBrowser()]);
      const { tokens } = await client.getToken(code);
      return tokens;
    } finally {
      listener.close();
    }
  };
}

export const authorizeInBrowser: AuthorizeFn = createBrowserAuthorizer();

// ─── Credential provider ─────────────────────────────────────────────────────

/**
 * The subset of OAuth2Client the provider relies on.
 */
export interface TokenClient {
  credentials: Credentials;
  setCredentials(credentials: Credentials): void;
  getAccessToken(): Promise<{ token?: string | null }>;
}

export interface CredentialProviderOptions {
  tokenPath: string;
  clientSecretsFile: string;
  scopes?: string[];
  fs?: typeof fs;
  createClient?: (secrets: ClientSecrets) => TokenClient;
  authorize?: AuthorizeFn;
  now?: () => number;
  log?: (line: string) => void;
}

function defaultCreateClient(secrets: ClientSecrets): TokenClient {
  return new OAuth2Client({
    clientId: secrets.clientId,
    clientSecret: secrets.clientSecret,
  });
}

/**
 * Google OAuth credential provider backed by a token cache file.
 *
 * On each call: reuse the cached token while it is fresh, refresh it when
 * it has a refresh token, otherwise run the browser flow. Any newly obtained
 * token is written back to the cache. Failures propagate to the caller.
 */
export function createCredentialProvider(
  options: CredentialProviderOptions
): AccessTokenProvider {
  const fsImpl = options.fs ?? fs;
  const scopes = options.scopes ?? GA_SCOPES;
  const createClient = options.createClient ?? defaultCreateClient;
  const authorize = options.authorize ?? authorizeInBrowser;
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;

  let credentials: Credentials | null = null;
  let loaded = false;

  async function obtain(current: Credentials | null): Promise<Credentials> {
    const secrets = readClientSecrets(options.clientSecretsFile, fsImpl);

    if (current?.refresh_token) {
      const client = createClient(secrets);
      client.setCredentials(current);
      const { token } = await client.getAccessToken();
      if (!token) {
        throw new Error("Token refresh did not return an access token");
      }
      log("[Auth] Refreshed Google Analytics access token");
      return {
        ...current,
        ...client.credentials,
        refresh_token: client.credentials.refresh_token ?? current.refresh_token,
        access_token: token,
      };
    }

    log("[Auth] No usable cached token, starting browser authorization");
    return authorize(secrets, scopes, log);
  }

  return {
    async getAccessToken() {
      if (!loaded) {
        credentials = readCachedToken(options.tokenPath, fsImpl);
        loaded = true;
      }

      if (credentials && isTokenFresh(credentials, now())) {
        return credentials.access_token ?? "";
      }

      const next = await obtain(credentials);
      if (!next.access_token) {
        throw new Error("Authorization did not return an access token");
      }
      credentials = next;
      writeCachedToken(options.tokenPath, next, fsImpl);
      return next.access_token;
    },
  };
}
