import { google, type gmail_v1 } from "googleapis";
import * as cheerio from "cheerio";
import type { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";
import { extractEmailAddress } from "../utils/text";
import { withRetry } from "../utils/retry";
import type { ParsedEmail } from "../types";

export function createOAuthClient(config: AppConfig["gmail"]) {
  const client = new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);
  client.setCredentials({ refresh_token: config.refreshToken });
  return client;
}

export type GoogleAuth = ReturnType<typeof createOAuthClient>;

export function messageLink(messageId: string): string {
  return `https://mail.google.com/mail/u/0/#all/${messageId}`;
}

export function stripHtml(html: string): string {
  const $ = cheerio.load(html);
  $("style, script").remove();
  return $("body").text().replace(/\s+/g, " ").trim();
}

function decodeBase64(data: string): string {
  return Buffer.from(data, "base64url").toString("utf-8");
}

function extractBody(payload?: gmail_v1.Schema$MessagePart): { text: string; html: string } {
  let text = "";
  let html = "";

  if (!payload) return { text, html };

  if (payload.mimeType === "text/plain" && payload.body?.data) {
    text = decodeBase64(payload.body.data);
  } else if (payload.mimeType === "text/html" && payload.body?.data) {
    html = decodeBase64(payload.body.data);
  }

  if (payload.parts) {
    for (const part of payload.parts) {
      const result = extractBody(part);
      if (result.text) text = result.text;
      if (result.html) html = result.html;
    }
  }

  return { text, html };
}

function messageDate(message: gmail_v1.Schema$Message, header: string): Date {
  const fromHeader = new Date(header);
  if (header && !Number.isNaN(fromHeader.getTime())) return fromHeader;

  const internal = Number(message.internalDate);
  if (message.internalDate && Number.isFinite(internal)) return new Date(internal);

  throw new Error(`Message ${message.id} has no usable date`);
}

/** Flattens a full-format Gmail message. HTML bodies win over plain text. */
export function toParsedEmail(message: gmail_v1.Schema$Message): ParsedEmail {
  const id = message.id;
  if (!id) throw new Error("Message has no id");

  const headers = message.payload?.headers || [];
  const getHeader = (name: string) =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value || "";

  const from = getHeader("From");
  const { text, html } = extractBody(message.payload);

  return {
    id,
    threadId: message.threadId || id,
    from,
    senderEmail: extractEmailAddress(from),
    subject: getHeader("Subject"),
    date: messageDate(message, getHeader("Date")),
    body: html ? stripHtml(html) : text.trim(),
    link: messageLink(id),
  };
}

export interface MailSource {
  fetchRecent(days: number, maxResults: number): Promise<ParsedEmail[]>;
}

export class GmailFetcher implements MailSource {
  private readonly gmail: gmail_v1.Gmail;

  constructor(auth: GoogleAuth) {
    this.gmail = google.gmail({ version: "v1", auth });
  }

  async fetchRecent(days: number, maxResults: number): Promise<ParsedEmail[]> {
    const query = `newer_than:${days}d`;
    logger.info(`Fetching emails with query "${query}" (max ${maxResults})`);

    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const page = await withRetry(
        () =>
          this.gmail.users.messages
            .list({
              userId: "me",
              q: query,
              maxResults: Math.min(500, maxResults - ids.length),
              pageToken,
            })
            .then((r) => r.data),
        { operation: "Gmail list" }
      );

      for (const msg of page.messages || []) {
        if (msg.id) ids.push(msg.id);
      }
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken && ids.length < maxResults);

    logger.info(`Found ${ids.length} messages`);

    const emails: ParsedEmail[] = [];
    for (const id of ids) {
      try {
        const message = await withRetry(
          () => this.gmail.users.messages.get({ userId: "me", id, format: "full" }).then((r) => r.data),
          { operation: `Gmail get ${id}` }
        );
        emails.push(toParsedEmail(message));
      } catch (error) {
        logger.error(`Failed to parse message ${id}`, error instanceof Error ? error.message : error);
      }
    }

    logger.info(`Total emails fetched: ${emails.length}`);
    return emails;
  }
}
