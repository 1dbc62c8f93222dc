import path from "path";
import fs from "fs/promises";
import { authenticate } from "@google-cloud/local-auth";
import { google } from "googleapis";
import type { OAuth2Client, Credentials } from "google-auth-library";

import { ConfigurationError } from "@name-sanitizer/core-domain";
import type { Logger } from "../ports/logger";
import { describeError } from "../application/errors";
import { getNumber, getString, getStringArray, isRecord } from "../application/guards";

type GoogleTokens = {
  access_token?: string;
  refresh_token?: string;
  scope?: string;
  token_type?: string;
  expiry_date?: number;
};

// renomear arquivos que o app não criou exige o escopo completo
export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive"];

export const TOKEN_FILE_NAME = "google.tokens.json";

// normaliza null -> undefined (entrada pode ser qualquer coisa)
function normalizeTokens(t: unknown): GoogleTokens {
  if (!isRecord(t)) return {};

  return {
    access_token: getString(t["access_token"]),
    refresh_token: getString(t["refresh_token"]),
    scope: getString(t["scope"]),
    token_type: getString(t["token_type"]),
    expiry_date: getNumber(t["expiry_date"]),
  };
}

type InstalledClient = { clientId: string; clientSecret: string; redirectUri: string };

export function readInstalledClient(credentials: unknown, source: string): InstalledClient {
  const creds = isRecord(credentials) ? credentials : {};
  const installedRaw = creds["installed"];
  const webRaw = creds["web"];
  const installed: Record<string, unknown> = isRecord(installedRaw) ? installedRaw : isRecord(webRaw) ? webRaw : {};

  const clientId = getString(installed["client_id"]);
  const clientSecret = getString(installed["client_secret"]);
  const redirectUris = getStringArray(installed["redirect_uris"]);

  if (!clientId || !clientSecret) {
    throw new ConfigurationError(
      `${source}: expected OAuth client JSON with "installed.client_id" and "installed.client_secret"`
    );
  }
  return { clientId, clientSecret, redirectUri: redirectUris?.[0] ?? "http://localhost" };
}

/**
 * OAuth do Drive: usa o token salvo em tokenDir; sem token, abre o fluxo de
 * consentimento no navegador e salva o resultado. Tokens renovados pelo
 * client são gravados de volta.
 */
export class GoogleAuth {
  private readonly tokenPath: string;
  private readonly credentialsPath: string;
  private readonly logger?: Logger;

  constructor(opts: { tokenDirAbs: string; credentialsPathAbs: string; logger?: Logger }) {
    this.tokenPath = path.join(opts.tokenDirAbs, TOKEN_FILE_NAME);
    this.credentialsPath = opts.credentialsPathAbs;
    this.logger = opts.logger;
  }

  async getAuthorizedClient(): Promise<OAuth2Client> {
    let credsRaw: string;
    try {
      credsRaw = await fs.readFile(this.credentialsPath, "utf-8");
    } catch (err) {
      throw new ConfigurationError(`Could not read Google credentials at ${this.credentialsPath}`, err);
    }
    const client = readInstalledClient(JSON.parse(credsRaw), this.credentialsPath);

    const saved = await this.safeReadTokens();
    if (saved) {
      const oAuth2Client: OAuth2Client = new google.auth.OAuth2(
        client.clientId,
        client.clientSecret,
        client.redirectUri
      );
      oAuth2Client.setCredentials(saved);
      // garante access_token (usa refresh_token se necessário)
      await oAuth2Client.getAccessToken();
      this.attachTokenSaver(oAuth2Client);
      return oAuth2Client;
    }

    const authedClient = await authenticate({
      keyfilePath: this.credentialsPath,
      scopes: DRIVE_SCOPES,
    });
    // local-auth traz a própria cópia do google-auth-library
    const authed = authedClient as unknown as OAuth2Client;

    await authed.getAccessToken();
    await this.saveTokens(normalizeTokens(authed.credentials));
    this.attachTokenSaver(authed);
    return authed;
  }

  /** Apaga o token salvo; o próximo getAuthorizedClient pede consentimento de novo. */
  async forgetTokens(): Promise<void> {
    await fs.rm(this.tokenPath, { force: true });
  }

  private attachTokenSaver(client: OAuth2Client): void {
    client.on("tokens", (t: Credentials) => {
      this.mergeTokens(t).catch((err: unknown) =>
        this.logger?.warn(`Could not save refreshed Google tokens: ${describeError(err)}`)
      );
    });
  }

  private async mergeTokens(t: Credentials): Promise<void> {
    const current = (await this.safeReadTokens()) ?? {};
    await this.saveTokens(normalizeTokens({ ...current, ...t }));
  }

  private async safeReadTokens(): Promise<GoogleTokens | null> {
    try {
      const raw = await fs.readFile(this.tokenPath, "utf-8");
      return normalizeTokens(JSON.parse(raw));
    } catch {
      return null;
    }
  }

  private async saveTokens(tokens: GoogleTokens): Promise<void> {
    await fs.mkdir(path.dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(tokens, null, 2), "utf-8");
  }
}
