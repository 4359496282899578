import { createServer as createHttpsServer } from "https";
import type { IncomingMessage, ServerResponse } from "http";
import { execFileSync } from "child_process";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import open from "open";
import type { Credentials } from "./credentials.js";
import { AuthorizationError } from "./errors.js";
import type { OAuthFlow } from "./oauth.js";

/**
 * Generate a self-signed certificate for the local HTTPS callback server.
 * Requires `openssl` CLI (available on macOS, Linux, and most Windows dev environments).
 */
function generateSelfSignedCert(): { key: string; cert: string; cleanup: () => void } {
  const tmp = mkdtempSync(join(tmpdir(), "threadkit-cert-"));
  const keyPath = join(tmp, "key.pem");
  const certPath = join(tmp, "cert.pem");
  const cleanup = () => rmSync(tmp, { recursive: true, force: true });

  try {
    execFileSync(
      "openssl",
      ["req", "-x509", "-newkey", "rsa:2048", "-keyout", keyPath, "-out", certPath, "-days", "1", "-nodes", "-subj", "/CN=localhost"],
      { stdio: "ignore" },
    );
  } catch {
    cleanup();
    throw new Error(
      "Failed to generate a self-signed certificate. Is OpenSSL installed?\n" +
      "  macOS:   brew install openssl\n" +
      "  Ubuntu:  sudo apt install openssl\n" +
      "  Windows: https://slproweb.com/products/Win32OpenSSL.html",
    );
  }

  const key = readFileSync(keyPath, "utf-8");
  const cert = readFileSync(certPath, "utf-8");
  return { key, cert, cleanup };
}

/**
 * Run the browser half of the OAuth flow: serve the redirect URI locally,
 * open the authorization page, and complete authorization with the callback.
 * The redirect URI must point at this machine over https.
 */
export function authorizeInBrowser(
  flow: OAuthFlow,
  options: { onUrl?: (url: string) => void } = {},
): Promise<Credentials> {
  const redirect = new URL(flow.config.redirectUri);
  const port = Number(redirect.port || 443);
  const { url: authUrl, state } = flow.authorizationUrl();

  return new Promise((resolve, reject) => {
    const tlsOptions = generateSelfSignedCert();
    const server = createHttpsServer(tlsOptions, (req: IncomingMessage, res: ServerResponse) => {
      const callbackUrl = new URL(req.url ?? "/", redirect.origin);
      if (callbackUrl.pathname !== redirect.pathname) {
        res.writeHead(404);
        res.end("Not found");
        return;
      }

      flow.completeAuthorization(callbackUrl.toString(), state).then(
        (credentials) => {
          res.writeHead(200, { "Content-Type": "text/html" });
          res.end("<html><body><h2>✓ Authorization complete!</h2><p>You can close this tab.</p></body></html>");
          server.close();
          resolve(credentials);
        },
        (err: unknown) => {
          res.writeHead(err instanceof AuthorizationError ? 400 : 502);
          res.end(`Authorization failed: ${err instanceof Error ? err.message : String(err)}`);
          server.close();
          reject(err);
        },
      );
    });

    server.listen(port, () => {
      options.onUrl?.(authUrl);
      open(authUrl).catch(() => {
        console.log(`Open this URL in your browser:\n${authUrl}`);
      });
    });

    server.on("error", (err) => {
      tlsOptions.cleanup();
      reject(err);
    });
    server.on("close", () => tlsOptions.cleanup());
  });
}
