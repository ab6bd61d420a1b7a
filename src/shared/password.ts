import { createHash, randomBytes, scrypt, timingSafeEqual } from "node:crypto";

export type ScryptParams = {
  N: number;
  r: number;
  p: number;
  keylen: number;
};

const DEFAULT_SCRYPT: ScryptParams = {
  // Reasonable defaults for interactive logins (adjust if needed).
  N: 16384,
  r: 8,
  p: 1,
  keylen: 64,
};

// Upper bounds accepted when reading a stored digest.
const MAX_N = 2 ** 20;
const MAX_R = 32;
const MAX_P = 16;

const DIGEST_KIND = "scrypt-sha256";
const DIGEST_VERSION = "1";

/**
 * Hashes and checks user secrets. Stateless; the only thing that ever sees a
 * stored digest.
 */
export interface CredentialVerifier {
  hash(secret: string): Promise<string>;
  verify(secret: string, digest: string): Promise<boolean>;
}

function scryptAsync(
  password: string,
  salt: Buffer,
  keylen: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  // 128 * N * r bytes is what scrypt needs; node's default maxmem (32 MiB) is too tight for larger N.
  const maxmem = Math.max(32 * 1024 * 1024, 256 * options.N * options.r);
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keylen, { ...options, maxmem }, (err, derivedKey) => {
      if (err) {return reject(err);}
      resolve(derivedKey);
    });
  });
}

/**
 * Fixed-size pre-hash so the scrypt cost does not depend on the secret's length.
 */
function preHash(secret: string): string {
  return createHash("sha256").update(secret, "utf8").digest("hex");
}

function parseDigest(encoded: string): {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
} | null {
  const parts = String(encoded || "").split("$");
  // Format: scrypt-sha256$1$N$r$p$salt$hash
  if (parts.length !== 7) {return null;}
  const [kind, version, Nraw, rraw, praw, saltB64, hashB64] = parts;
  if (kind !== DIGEST_KIND || version !== DIGEST_VERSION) {return null;}

  const N = Number(Nraw);
  const r = Number(rraw);
  const p = Number(praw);
  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p)) {return null;}
  if (N <= 1 || r <= 0 || p <= 0) {return null;}
  // scrypt requires N to be a power of two.
  if ((N & (N - 1)) !== 0 || N > MAX_N || r > MAX_R || p > MAX_P) {return null;}

  const salt = Buffer.from(saltB64, "base64url");
  const hash = Buffer.from(hashB64, "base64url");
  if (salt.length < 8 || hash.length < 32) {return null;}
  return {
    params: { N, r, p, keylen: hash.length },
    salt,
    hash,
  };
}

export async function hashPassword(password: string, params: Partial<ScryptParams> = {}): Promise<string> {
  const p: ScryptParams = { ...DEFAULT_SCRYPT, ...params };
  const salt = randomBytes(16);
  const derived = await scryptAsync(preHash(password), salt, p.keylen, { N: p.N, r: p.r, p: p.p });
  return [
    DIGEST_KIND,
    DIGEST_VERSION,
    p.N,
    p.r,
    p.p,
    salt.toString("base64url"),
    derived.toString("base64url"),
  ].join("$");
}

export async function verifyPassword(password: string, encoded: string): Promise<boolean> {
  const parsed = parseDigest(encoded);
  if (!parsed) {return false;}

  const derived = await scryptAsync(preHash(password), parsed.salt, parsed.params.keylen, {
    N: parsed.params.N,
    r: parsed.params.r,
    p: parsed.params.p,
  });

  if (derived.length !== parsed.hash.length) {return false;}
  return timingSafeEqual(derived, parsed.hash);
}

export function createScryptCredentialVerifier(params: Partial<ScryptParams> = {}): CredentialVerifier {
  return {
    hash: (secret) => hashPassword(secret, params),
    verify: (secret, digest) => verifyPassword(secret, digest),
  };
}
