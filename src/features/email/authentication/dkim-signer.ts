import {
  KeyLike,
  KeyObject,
  createHash,
  createPrivateKey,
  generateKeyPairSync,
  sign,
  verify,
} from "crypto";
import { ConfigurationError } from "@core/errors/app-errors";

export type Canonicalization = "simple" | "relaxed";
export type CanonicalizationPair = `${Canonicalization}/${Canonicalization}`;

export const DEFAULT_SIGNED_HEADERS = ["from", "to", "subject", "date", "mime-version", "content-type"];

export interface DkimConfig {
  domain?: string;
  selector?: string;
  privateKey?: string;
  canonicalization?: CanonicalizationPair;
  signedHeaders?: string[];
}

export interface DkimKeyPair {
  privateKey: string;
  publicKey: string;
  /** TXT record value to publish at `<selector>._domainkey.<domain>`. */
  dnsRecord: string;
}

type HeaderMap = Record<string, string>;

export function canonicalizeHeader(name: string, value: string, mode: Canonicalization): string {
  if (mode === "simple") {
    return `${name}: ${value}\r\n`;
  }
  const unfolded = value.replace(/\r?\n(?=[ \t])/g, "");
  return `${name.toLowerCase()}:${unfolded.replace(/[ \t]+/g, " ").trim()}\r\n`;
}

export function canonicalizeBody(body: string, mode: Canonicalization): string {
  const lines = body.replace(/\r?\n/g, "\r\n").split("\r\n");

  if (mode === "relaxed") {
    const relaxed = lines.map((line) => line.replace(/[ \t]+/g, " ").replace(/ +$/, ""));
    while (relaxed.length > 0 && relaxed[relaxed.length - 1] === "") {
      relaxed.pop();
    }
    return relaxed.length === 0 ? "" : `${relaxed.join("\r\n")}\r\n`;
  }

  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return `${lines.join("\r\n")}\r\n`;
}

export function bodyHash(body: string, mode: Canonicalization): string {
  return createHash("sha256").update(canonicalizeBody(body, mode), "utf8").digest("base64");
}

function parseCanonicalization(value: string | undefined): [Canonicalization, Canonicalization] {
  const [header, body = "simple"] = (value ?? "simple/simple").split("/");
  const asMode = (mode: string): Canonicalization => (mode === "relaxed" ? "relaxed" : "simple");
  return [asMode(header), asMode(body)];
}

function findHeader(headers: HeaderMap, name: string): [string, string] | undefined {
  const lower = name.toLowerCase();
  return Object.entries(headers).find(([key]) => key.toLowerCase() === lower);
}

function parseTags(value: string): Map<string, string> {
  const tags = new Map<string, string>();
  for (const segment of value.split(";")) {
    const separator = segment.indexOf("=");
    if (separator === -1) continue;
    tags.set(segment.slice(0, separator).trim(), segment.slice(separator + 1).replace(/\s+/g, ""));
  }
  return tags;
}

function signedData(
  headers: HeaderMap,
  signedNames: string[],
  dkimValueWithoutSignature: string,
  mode: Canonicalization,
): string | null {
  let data = "";
  for (const name of signedNames) {
    const header = findHeader(headers, name);
    if (!header) return null;
    data += canonicalizeHeader(header[0], header[1], mode);
  }
  // The DKIM-Signature header itself is signed last, without its trailing CRLF.
  return data + canonicalizeHeader("DKIM-Signature", dkimValueWithoutSignature, mode).slice(0, -2);
}

/**
 * RSA-SHA256 DKIM signer (RFC 6376). Signs the configured header subset that
 * is present on the message plus the body hash.
 */
export class DkimSigner {
  readonly domain: string;
  readonly selector: string;
  private readonly key: KeyObject;
  private readonly headerMode: Canonicalization;
  private readonly bodyMode: Canonicalization;
  private readonly signedHeaders: string[];

  constructor(config: DkimConfig) {
    if (!config.domain || !config.selector || !config.privateKey) {
      throw new ConfigurationError("DKIM signing requires a domain, a selector and a private key");
    }

    let key: KeyObject;
    try {
      key = createPrivateKey(config.privateKey);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid DKIM private key: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (key.asymmetricKeyType !== "rsa") {
      throw new ConfigurationError("DKIM private key must be an RSA key");
    }

    this.domain = config.domain;
    this.selector = config.selector;
    this.key = key;
    [this.headerMode, this.bodyMode] = parseCanonicalization(config.canonicalization ?? "relaxed/simple");
    this.signedHeaders = (config.signedHeaders ?? DEFAULT_SIGNED_HEADERS).map((name) => name.toLowerCase());
  }

  /** Returns the DKIM-Signature header value. */
  sign(headers: HeaderMap, body: string, timestamp: number = Math.floor(Date.now() / 1000)): string {
    const signedNames = this.signedHeaders.filter((name) => findHeader(headers, name) !== undefined);

    const tags = [
      "v=1",
      "a=rsa-sha256",
      `c=${this.headerMode}/${this.bodyMode}`,
      `d=${this.domain}`,
      `s=${this.selector}`,
      `t=${timestamp}`,
      `h=${signedNames.join(":")}`,
      `bh=${bodyHash(body, this.bodyMode)}`,
      "b=",
    ].join("; ");

    const data = signedData(headers, signedNames, tags, this.headerMode);
    if (data === null) {
      throw new ConfigurationError("Signed header disappeared while signing");
    }

    const signature = sign("sha256", Buffer.from(data, "utf8"), this.key).toString("base64");
    return `${tags}${signature}`;
  }

  dnsRecordName(): string {
    return `${this.selector}._domainkey.${this.domain}`;
  }

  static verify(headers: HeaderMap, body: string, dkimHeaderValue: string, publicKey: KeyLike): boolean {
    const tags = parseTags(dkimHeaderValue);
    const signature = tags.get("b");
    const expectedBodyHash = tags.get("bh");
    const signedNames = tags.get("h");

    if (tags.get("v") !== "1" || tags.get("a") !== "rsa-sha256" || !signature || !expectedBodyHash || !signedNames) {
      return false;
    }

    const [headerMode, bodyMode] = parseCanonicalization(tags.get("c"));
    if (bodyHash(body, bodyMode) !== expectedBodyHash) {
      return false;
    }

    const withoutSignature = dkimHeaderValue.replace(/(^|;)(\s*b\s*=)[^;]*/, "$1$2");
    const data = signedData(headers, signedNames.split(":"), withoutSignature, headerMode);
    if (data === null) {
      return false;
    }

    try {
      return verify("sha256", Buffer.from(data, "utf8"), publicKey, Buffer.from(signature, "base64"));
    } catch {
      return false;
    }
  }

  static generateKeyPair(modulusLength = 2048): DkimKeyPair {
    const { privateKey, publicKey } = generateKeyPairSync("rsa", {
      modulusLength,
      publicKeyEncoding: { type: "spki", format: "pem" },
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
    });

    const encoded = publicKey
      .replace(/-----(BEGIN|END) PUBLIC KEY-----/g, "")
      .replace(/\s+/g, "");

    return { privateKey, publicKey, dnsRecord: `v=DKIM1; k=rsa; p=${encoded}` };
  }
}
