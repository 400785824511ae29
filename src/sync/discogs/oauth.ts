import { createHmac, randomBytes } from "crypto";
import type { OAuthCredentials } from "@/sync/types/api";

/** Percent-encode a string per RFC 3986 (stricter than encodeURIComponent). */
export function percentEncode(str: string): string {
  return encodeURIComponent(str).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * OAuth 1.0a signature base string: METHOD&encoded(base url)&encoded(sorted params).
 * Query parameters of `urlString` are folded into the parameter set.
 */
export function signatureBaseString(
  method: string,
  urlString: string,
  oauthParams: Record<string, string>,
): string {
  const url = new URL(urlString);
  const allParams: Array<[string, string]> = Object.entries(oauthParams);
  url.searchParams.forEach((value, key) => {
    allParams.push([key, value]);
  });

  const normalized = allParams
    .map(([key, value]): [string, string] => [percentEncode(key), percentEncode(value)])
    .sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)))
    .map(([key, value]) => `${key}=${value}`)
    .join("&");

  return [
    method.toUpperCase(),
    percentEncode(`${url.origin}${url.pathname}`),
    percentEncode(normalized),
  ].join("&");
}

export function sign(baseString: string, consumerSecret: string, tokenSecret: string): string {
  const signingKey = `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
  return createHmac("sha1", signingKey).update(baseString).digest("base64");
}

/** Build the HMAC-SHA1 signed `Authorization: OAuth ...` header value. */
export function buildOAuthHeader(
  method: string,
  urlString: string,
  credentials: OAuthCredentials,
  overrides: { nonce?: string; timestamp?: string } = {},
): string {
  const oauthParams: Record<string, string> = {
    oauth_consumer_key: credentials.consumerKey,
    oauth_nonce: overrides.nonce ?? randomBytes(16).toString("hex"),
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: overrides.timestamp ?? Math.floor(Date.now() / 1000).toString(),
    oauth_token: credentials.token,
    oauth_version: "1.0",
  };

  const signature = sign(
    signatureBaseString(method, urlString, oauthParams),
    credentials.consumerSecret,
    credentials.tokenSecret,
  );

  const headerParams = Object.keys(oauthParams)
    .sort()
    .map((key) => `${percentEncode(key)}="${percentEncode(oauthParams[key])}"`)
    .join(", ");

  return `OAuth ${headerParams}, oauth_signature="${percentEncode(signature)}"`;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
