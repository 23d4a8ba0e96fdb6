import crypto from "node:crypto";

export function uid(prefix: string): string {
  return `${prefix}_${crypto.randomBytes(6).toString("hex")}_${Date.now().toString(36)}`;
}

export function hashValue(value: string): string {
  const hash = crypto.createHash("sha256");
  hash.update(value);
  return hash.digest("hex");
}

function hmac(value: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(value).digest("hex");
}

export function signIdentity(identity: string, secret: string): string {
  return `${identity}.${hmac(identity, secret)}`;
}

export function verifyIdentityToken(token: string, secret: string): string | undefined {
  const separator = token.lastIndexOf(".");
  if (separator <= 0) {
    return undefined;
  }
  const identity = token.slice(0, separator);
  const provided = Buffer.from(token.slice(separator + 1), "hex");
  const expected = Buffer.from(hmac(identity, secret), "hex");
  if (provided.length !== expected.length || !crypto.timingSafeEqual(provided, expected)) {
    return undefined;
  }
  return identity;
}
