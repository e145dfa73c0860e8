import { Command } from "commander";
import { buildAuthorizeUrl } from "../auth/authorize";
import { DEFAULT_SESSION, FileCredentialStore } from "../auth/credentials";
import { createTokenClient } from "../auth/tokenClient";
import { loadConfig, requireSpotifyClient } from "../lib/config";

type SessionOptions = {
  session?: string;
};

function sessionOf(options: SessionOptions): string {
  return options.session?.trim() || DEFAULT_SESSION;
}

export function runLogin(): void {
  const config = loadConfig();
  const { clientId } = requireSpotifyClient(config);
  const url = buildAuthorizeUrl({
    clientId,
    redirectUri: config.spotify.redirect_uri,
    scopes: config.spotify.scopes,
    accountsBaseUrl: config.spotify.accounts_base_url,
  });

  console.log("Open this URL in a browser and approve access:");
  console.log(`  ${url}`);
  console.log("");
  console.log(`Then copy the "code" query parameter from the redirect to ${config.spotify.redirect_uri}`);
  console.log("and run: tracksift auth exchange <code>");
}

export async function runExchange(code: string, options: SessionOptions): Promise<void> {
  const config = loadConfig();
  const { clientId, clientSecret } = requireSpotifyClient(config);
  const tokenClient = createTokenClient({
    clientId,
    clientSecret,
    redirectUri: config.spotify.redirect_uri,
    accountsBaseUrl: config.spotify.accounts_base_url,
  });

  const tokens = await tokenClient.exchangeCode(code.trim());
  if (!tokens.refreshToken) {
    throw new Error("Spotify did not return a refresh token; run `tracksift auth login` again.");
  }

  const sessionId = sessionOf(options);
  new FileCredentialStore(config.credentials.path).store(sessionId, {
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
  });
  console.log(`Logged in. Credentials stored for session "${sessionId}".`);
}

export function runStatus(options: SessionOptions): void {
  const config = loadConfig();
  const sessionId = sessionOf(options);
  const credential = new FileCredentialStore(config.credentials.path).get(sessionId);
  if (!credential) {
    console.log(`Session "${sessionId}": not logged in.`);
    return;
  }
  const refresh = credential.refreshToken ? "refresh token stored" : "no refresh token";
  console.log(`Session "${sessionId}": logged in (${refresh}).`);
}

export function runLogout(options: SessionOptions): void {
  const config = loadConfig();
  const sessionId = sessionOf(options);
  new FileCredentialStore(config.credentials.path).clear(sessionId);
  console.log(`Session "${sessionId}" logged out.`);
}

export function registerAuthCommand(program: Command): void {
  const authCmd = program.command("auth").description("Manage the Spotify login");

  authCmd
    .command("login")
    .description("Print the Spotify authorization URL")
    .action(() => runLogin());

  authCmd
    .command("exchange")
    .description("Exchange an authorization code for tokens")
    .argument("<code>", "Authorization code from the redirect URL")
    .option("--session <id>", "Session to store the tokens under", DEFAULT_SESSION)
    .action(async (code: string, options: SessionOptions) => {
      await runExchange(code, options);
    });

  authCmd
    .command("status")
    .description("Show whether a session is logged in")
    .option("--session <id>", "Session id", DEFAULT_SESSION)
    .action((options: SessionOptions) => runStatus(options));

  authCmd
    .command("logout")
    .description("Forget a session's tokens")
    .option("--session <id>", "Session id", DEFAULT_SESSION)
    .action((options: SessionOptions) => runLogout(options));
}
