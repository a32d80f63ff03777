import MailComposer from "nodemailer/lib/mail-composer";

export interface MimeSource {
  from: string;
  to: string;
  subject: string;
  html: string;
  text: string;
  messageId: string;
  date: Date;
  headers: Record<string, string>;
}

export interface ParsedMime {
  /** Header values as written, folding included, keyed by the name as written. */
  headers: Record<string, string>;
  body: string;
}

// nodemailer generates these itself from the mail options.
const MANAGED_HEADERS = new Set([
  "from",
  "to",
  "subject",
  "message-id",
  "date",
  "mime-version",
  "content-type",
  "return-path",
]);

export function passThroughHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!MANAGED_HEADERS.has(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return result;
}

/** Builds the exact RFC 5322 message nodemailer would put on the wire. */
export function composeMime(source: MimeSource): Promise<string> {
  const composer = new MailComposer({
    from: source.from,
    to: source.to,
    subject: source.subject,
    html: source.html,
    text: source.text,
    messageId: source.messageId,
    date: source.date,
    headers: passThroughHeaders(source.headers),
  });

  return new Promise((resolve, reject) => {
    composer.compile().build((error, message) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(message.toString("utf8"));
    });
  });
}

export function parseMime(raw: string): ParsedMime {
  const separator = /\r?\n\r?\n/.exec(raw);
  const headerBlock = separator ? raw.slice(0, separator.index) : raw;
  const body = separator ? raw.slice(separator.index + separator[0].length) : "";

  const headers: Record<string, string> = {};
  let current: string | null = null;
  for (const line of headerBlock.split(/\r?\n/)) {
    if (/^[ \t]/.test(line) && current !== null) {
      headers[current] += `\r\n${line}`;
      continue;
    }
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    current = line.slice(0, colon);
    headers[current] = line.slice(colon + 1).replace(/^ /, "");
  }

  return { headers, body };
}
