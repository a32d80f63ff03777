import jwt from "jsonwebtoken";
import nodemailer from "nodemailer";
import { describe, it, expect } from "vitest";
import { DeliveryAuthenticator } from "@features/email/authentication/delivery-authenticator";
import { DkimSigner } from "@features/email/authentication/dkim-signer";
import { MimeSource, parseMime } from "@features/email/smtp/mime-composer";
import { createUnsubscribeToken, verifyUnsubscribeToken } from "@features/subscriber/unsubscribe-token";

const SECRET = "test-secret";
const keys = DkimSigner.generateKeyPair(1024);
const date = new Date(Date.UTC(2026, 0, 1));

async function mimeSource(auth: DeliveryAuthenticator): Promise<MimeSource> {
  const messageId = "<fixed@example.com>";
  const headers = auth.authenticate({
    from: '"Team" <team@example.com>',
    to: "ana@example.com",
    subject: "Hello Ana, a long subject line that nodemailer will have to fold somewhere",
    recipientId: "sub-1",
    campaignId: "camp-1",
    date,
    messageId,
  });
  return {
    from: '"Team" <team@example.com>',
    to: "ana@example.com",
    subject: "Hello Ana, a long subject line that nodemailer will have to fold somewhere",
    html: '<p>Hi</p><img src="https://mail.example.com/track/pixel/abc" />',
    text: "Hi",
    messageId,
    date,
    headers,
  };
}

function authenticator(withSigner = false): DeliveryAuthenticator {
  return new DeliveryAuthenticator({
    domain: "example.com",
    publicBaseUrl: "https://mail.example.com/",
    unsubscribeSecret: SECRET,
    returnPath: "bounces@example.com",
    organization: "Example Co",
    signer: withSigner
      ? new DkimSigner({ domain: "example.com", selector: "mail", privateKey: keys.privateKey })
      : undefined,
  });
}

describe("DeliveryAuthenticator", () => {
  it("creates domain-scoped unique message ids", () => {
    const auth = authenticator();
    const first = auth.createMessageId();

    expect(first).toMatch(/^<[0-9a-f-]{36}\.\d+@example\.com>$/);
    expect(auth.createMessageId()).not.toBe(first);
  });

  it("points the unsubscribe link at a verifiable token", () => {
    const url = authenticator().unsubscribeUrl("sub-1", "camp-1");
    const prefix = "https://mail.example.com/api/subscribers/unsubscribe/";

    expect(url.startsWith(prefix)).toBe(true);
    expect(verifyUnsubscribeToken(url.slice(prefix.length), SECRET)).toEqual({
      subscriberId: "sub-1",
      campaignId: "camp-1",
    });
  });

  it("builds the full header set", () => {
    const auth = authenticator();
    const headers = auth.authenticate({
      from: "Team <team@example.com>",
      to: "ana@example.com",
      subject: "Hello",
      recipientId: "sub-1",
      campaignId: "camp-1",
      date,
      messageId: "<fixed@example.com>",
    });

    expect(headers).toEqual({
      From: "Team <team@example.com>",
      To: "ana@example.com",
      Subject: "Hello",
      "Message-ID": "<fixed@example.com>",
      Date: "Thu, 01 Jan 2026 00:00:00 GMT",
      "MIME-Version": "1.0",
      "List-Unsubscribe": `<${auth.unsubscribeUrl("sub-1", "camp-1")}>, <mailto:unsubscribe@example.com?subject=unsubscribe>`,
      "List-Unsubscribe-Post": "List-Unsubscribe=One-Click",
      "X-Priority": "3",
      "X-Auto-Response-Suppress": "OOF, DR, RN, NRN",
      "Return-Path": "<bounces@example.com>",
      Organization: "Example Co",
    });
    expect(auth.dkimEnabled).toBe(false);
  });

  it("leaves the composed message unsigned without a signer", async () => {
    const raw = await authenticator().seal(await mimeSource(authenticator()));

    expect(raw.startsWith("DKIM-Signature:")).toBe(false);
    expect(parseMime(raw).headers["List-Unsubscribe-Post"]).toBe("List-Unsubscribe=One-Click");
  });

  it("signs the message exactly as nodemailer puts it on the wire", async () => {
    const auth = authenticator(true);
    const raw = await auth.seal(await mimeSource(auth));

    const wire = nodemailer.createTransport({ streamTransport: true, buffer: true, newline: "windows" });
    const info = await wire.sendMail({ envelope: { from: "bounces@example.com", to: "ana@example.com" }, raw });
    const sent = Buffer.isBuffer(info.message) ? info.message.toString("utf8") : "";
    const { headers, body } = parseMime(sent);
    const signature = headers["DKIM-Signature"];

    expect(headers["Content-Type"]).toMatch(/^multipart\/alternative;/);
    expect(signature).toContain("t=1767225600;");
    expect(signature).toContain("h=from:to:subject:date:mime-version:content-type;");
    expect(DkimSigner.verify(headers, body, signature, keys.publicKey)).toBe(true);
    expect(DkimSigner.verify(headers, body.replace("abc", "abd"), signature, keys.publicKey)).toBe(false);
    expect(DkimSigner.verify({ ...headers, Subject: "Changed" }, body, signature, keys.publicKey)).toBe(false);
  });
});

describe("unsubscribe tokens", () => {
  const token = createUnsubscribeToken({ subscriberId: "sub-1", campaignId: "camp-1" }, SECRET);

  it("round-trips the claims", () => {
    expect(verifyUnsubscribeToken(token, SECRET)).toEqual({ subscriberId: "sub-1", campaignId: "camp-1" });
  });

  it("rejects a token signed with another secret or altered", () => {
    const [header, , signature] = token.split(".");
    const forgedPayload = Buffer.from(JSON.stringify({ subscriberId: "sub-2", campaignId: "camp-1" })).toString(
      "base64url",
    );

    expect(verifyUnsubscribeToken(token, "other-secret")).toBeNull();
    expect(verifyUnsubscribeToken(`${header}.${forgedPayload}.${signature}`, SECRET)).toBeNull();
    expect(verifyUnsubscribeToken("not-a-token", SECRET)).toBeNull();
    expect(verifyUnsubscribeToken(`${token}.extra`, SECRET)).toBeNull();
  });

  it("rejects a validly signed token without the unsubscribe claims", () => {
    const unrelated = jwt.sign({ userId: "user-1" }, SECRET);

    expect(verifyUnsubscribeToken(unrelated, SECRET)).toBeNull();
  });

  it("issues a standard HS256 token", () => {
    expect(jwt.decode(token, { complete: true })?.header.alg).toBe("HS256");
  });
});
