// HTTP digest authentication (RFC 2617, MD5) for the camera's CGI API
import crypto from 'crypto';

export interface DigestChallenge {
  realm: string;
  nonce: string;
  qop?: string;
  opaque?: string;
  algorithm?: string;
}

export interface DigestCredentials {
  username: string;
  password: string;
}

export interface DigestRequest {
  method: string;
  uri: string;
  nonceCount: number;
  cnonce?: string;
}

const PARAM_REGEX = /(\w+)=(?:"([^"]*)"|([^\s,]+))/g;

function md5(value: string): string {
  return crypto.createHash('md5').update(value).digest('hex');
}

/** Parse a `WWW-Authenticate: Digest ...` header; null for any other scheme. */
export function parseDigestChallenge(header: string): DigestChallenge | null {
  const trimmed = header.trim();
  if (!/^digest\s/i.test(trimmed)) return null;
  const params: Record<string, string> = {};
  for (const match of trimmed.slice(6).matchAll(PARAM_REGEX)) {
    params[match[1].toLowerCase()] = match[2] ?? match[3] ?? '';
  }
  if (!params.realm || !params.nonce) return null;
  return {
    realm: params.realm,
    nonce: params.nonce,
    qop: params.qop,
    opaque: params.opaque,
    algorithm: params.algorithm,
  };
}

/** Build the `Authorization` header value answering a digest challenge. */
export function buildDigestAuthorization(challenge: DigestChallenge, creds: DigestCredentials, req: DigestRequest): string {
  const ha1 = md5(`${creds.username}:${challenge.realm}:${creds.password}`);
  const ha2 = md5(`${req.method.toUpperCase()}:${req.uri}`);
  const qop = challenge.qop?.split(',').map((q) => q.trim()).includes('auth') ? 'auth' : undefined;

  const parts = [
    `username="${creds.username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${req.uri}"`,
  ];
  let response: string;
  if (qop) {
    const nc = req.nonceCount.toString(16).padStart(8, '0');
    const cnonce = req.cnonce ?? crypto.randomBytes(8).toString('hex');
    response = md5(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:${qop}:${ha2}`);
    parts.push(`qop=${qop}`, `nc=${nc}`, `cnonce="${cnonce}"`);
  } else {
    response = md5(`${ha1}:${challenge.nonce}:${ha2}`);
  }
  parts.push(`response="${response}"`);
  if (challenge.opaque) parts.push(`opaque="${challenge.opaque}"`);
  if (challenge.algorithm) parts.push(`algorithm=${challenge.algorithm}`);
  return `Digest ${parts.join(', ')}`;
}
