import { google, gmail_v1 } from "googleapis";
import type { Credentials, OAuth2Client } from "google-auth-library";
import * as fs from "fs/promises";
import * as path from "path";
import * as readline from "readline";
import { z } from "zod";
import type {
  CandidatePage,
  DetailFormat,
  GmailCredentials,
  MailTransport,
  MatchableMessage,
} from "./types.js";
import { DEFAULT_RETRY_CONFIG, type RetryConfig, withRetry } from "./retry.js";
import { MailRulesError, TransportError } from "./errors.js";
import { logger } from "./config.js";

// batchDelete needs the full-access scope
const SCOPES = ["https://mail.google.com/"];

export const SYSTEM_LABELS = new Set([
  "INBOX",
  "SPAM",
  "TRASH",
  "UNREAD",
  "IMPORTANT",
  "STARRED",
  "SENT",
  "DRAFT",
  "CATEGORY_PERSONAL",
  "CATEGORY_SOCIAL",
  "CATEGORY_PROMOTIONS",
  "CATEGORY_UPDATES",
  "CATEGORY_FORUMS",
]);

const METADATA_HEADERS = ["From", "To", "Subject", "Date"];

const ClientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const CredentialsFileSchema = z.object({
  installed: ClientSecretsSchema.optional(),
  web: ClientSecretsSchema.optional(),
});

const TokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  expiry_date: z.number().nullish(),
  id_token: z.string().nullish(),
});

export interface GmailClientOptions {
  credentialsFile: string;
  tokenFile: string;
  maxBatchSize?: number;
  maxPageSize?: number;
  retry?: Partial<RetryConfig>;
}

function getHeader(
  headers: gmail_v1.Schema$MessagePartHeader[],
  name: string
): string {
  const header = headers.find(
    (h) => h.name?.toLowerCase() === name.toLowerCase()
  );
  return header?.value ?? "";
}

/**
 * Normalize a Gmail message into a MatchableMessage. Label ids are shown by
 * name where the name is known.
 */
export function toMatchableMessage(
  message: gmail_v1.Schema$Message,
  labelNames: ReadonlyMap<string, string> = new Map()
): MatchableMessage {
  if (!message.id) {
    throw new TransportError("Gmail returned a message without an id");
  }

  const headers = message.payload?.headers ?? [];
  const internalDate = message.internalDate ? Number(message.internalDate) : NaN;
  const headerDate = Date.parse(getHeader(headers, "Date"));
  const receivedAt = !Number.isNaN(internalDate)
    ? new Date(internalDate)
    : !Number.isNaN(headerDate)
      ? new Date(headerDate)
      : null;

  return {
    id: message.id,
    threadId: message.threadId ?? null,
    from: getHeader(headers, "From"),
    to: getHeader(headers, "To"),
    subject: getHeader(headers, "Subject"),
    bodySnippet: message.snippet ?? "",
    labels: new Set(
      (message.labelIds ?? []).map((labelId) => labelNames.get(labelId) ?? labelId)
    ),
    receivedAt,
  };
}

/**
 * Gmail API transport for rule application
 */
export class GmailClient implements MailTransport {
  readonly maxBatchSize: number;
  readonly maxPageSize: number;
  private oauth2Client: OAuth2Client | null = null;
  private gmail: gmail_v1.Gmail | null = null;
  private credentialsFile: string;
  private tokenFile: string;
  private retryConfig: RetryConfig;
  private labelIdsByName = new Map<string, string>();
  private labelNamesById = new Map<string, string>();
  private labelsLoaded = false;

  constructor(options: GmailClientOptions) {
    this.credentialsFile = options.credentialsFile;
    this.tokenFile = options.tokenFile;
    this.maxBatchSize = options.maxBatchSize ?? 1000;
    this.maxPageSize = options.maxPageSize ?? 500;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
  }

  /**
   * Initialize the Gmail client with OAuth2 authentication
   */
  async initialize(): Promise<void> {
    logger.info("Initializing Gmail client...");

    const credentials = await this.loadCredentials();
    const secrets = credentials.installed ?? credentials.web;
    if (!secrets) {
      throw new MailRulesError(
        "Invalid credentials file format",
        "CREDENTIALS_ERROR"
      );
    }

    this.oauth2Client = new google.auth.OAuth2(
      secrets.client_id,
      secrets.client_secret,
      secrets.redirect_uris?.[0] ?? "http://localhost"
    );

    const token = await this.getToken(this.oauth2Client);
    this.oauth2Client.setCredentials(token);

    this.gmail = google.gmail({ version: "v1", auth: this.oauth2Client });
    logger.info("Gmail client initialized");
  }

  private requireGmail(): gmail_v1.Gmail {
    if (!this.gmail) {
      throw new Error("Gmail client not initialized. Call initialize() first.");
    }
    return this.gmail;
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, this.retryConfig);
  }

  /**
   * Load credentials from file
   */
  private async loadCredentials(): Promise<GmailCredentials> {
    let content: string;
    try {
      content = await fs.readFile(this.credentialsFile, "utf-8");
    } catch (error) {
      throw new MailRulesError(
        `Failed to load credentials from ${this.credentialsFile}. ` +
          "Please download OAuth 2.0 credentials from Google Cloud Console.",
        "CREDENTIALS_ERROR",
        { cause: error }
      );
    }
    const parsed = CredentialsFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new MailRulesError(
        `Invalid credentials file format: ${this.credentialsFile}`,
        "CREDENTIALS_ERROR",
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Get OAuth2 token, either from file or by prompting user
   */
  private async getToken(client: OAuth2Client): Promise<Credentials> {
    let content: string;
    try {
      content = await fs.readFile(this.tokenFile, "utf-8");
    } catch {
      logger.info("No token found, initiating OAuth flow...");
      return this.getNewToken(client);
    }

    const parsed = TokenSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      logger.warn(`Stored token at ${this.tokenFile} is invalid, re-authorizing`);
      return this.getNewToken(client);
    }
    return parsed.data;
  }

  /**
   * Get a new token by prompting user for authorization
   */
  private async getNewToken(client: OAuth2Client): Promise<Credentials> {
    const authUrl = client.generateAuthUrl({
      access_type: "offline",
      scope: SCOPES,
      prompt: "consent",
    });

    console.log("\nAuthorize this app by visiting this URL:\n");
    console.log(authUrl);
    console.log("\n");

    const code = await this.promptForCode();
    const { tokens } = await client.getToken(code);

    await fs.mkdir(path.dirname(this.tokenFile), { recursive: true });
    await fs.writeFile(this.tokenFile, JSON.stringify(tokens, null, 2));
    logger.info("Token saved successfully");

    return tokens;
  }

  /**
   * Prompt user to enter authorization code
   */
  private promptForCode(): Promise<string> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    return new Promise((resolve) => {
      rl.question("Enter the authorization code: ", (code: string) => {
        rl.close();
        resolve(code.trim());
      });
    });
  }

  /**
   * Refresh the label name/id cache
   */
  private async loadLabels(): Promise<void> {
    const gmail = this.requireGmail();
    const response = await this.call("labels.list", () =>
      gmail.users.labels.list({ userId: "me" })
    );

    this.labelIdsByName.clear();
    this.labelNamesById.clear();
    for (const label of response.data.labels ?? []) {
      if (label.id && label.name) {
        this.labelIdsByName.set(label.name.toLowerCase(), label.id);
        this.labelNamesById.set(label.id, label.name);
      }
    }
    this.labelsLoaded = true;
    logger.debug(`Label cache holds ${this.labelNamesById.size} label(s)`);
  }

  private async ensureLabels(): Promise<void> {
    if (!this.labelsLoaded) {
      await this.loadLabels();
    }
  }

  /**
   * Resolve a label name (or id) to its id, refreshing the cache once on a miss
   */
  async getLabelId(nameOrId: string): Promise<string | null> {
    if (SYSTEM_LABELS.has(nameOrId.toUpperCase())) {
      return nameOrId.toUpperCase();
    }

    await this.ensureLabels();
    const lookup = (): string | null =>
      (this.labelNamesById.has(nameOrId) ? nameOrId : null) ??
      this.labelIdsByName.get(nameOrId.toLowerCase()) ??
      null;

    const found = lookup();
    if (found) {
      return found;
    }
    await this.loadLabels();
    return lookup();
  }

  /**
   * Get or create a Gmail label
   */
  private async getOrCreateLabel(labelName: string): Promise<string> {
    const existing = await this.getLabelId(labelName);
    if (existing) {
      return existing;
    }

    const gmail = this.requireGmail();
    logger.info(`Creating label: ${labelName}`);
    const createResponse = await this.call("labels.create", () =>
      gmail.users.labels.create({
        userId: "me",
        requestBody: {
          name: labelName,
          labelListVisibility: "labelShow",
          messageListVisibility: "show",
        },
      })
    );

    const labelId = createResponse.data.id;
    if (!labelId) {
      throw new TransportError(`Failed to create label: ${labelName}`);
    }
    this.labelIdsByName.set(labelName.toLowerCase(), labelId);
    this.labelNamesById.set(labelId, labelName);
    return labelId;
  }

  async listCandidates(
    query: string,
    maxResults: number,
    pageToken?: string
  ): Promise<CandidatePage> {
    const gmail = this.requireGmail();
    const response = await this.call("messages.list", () =>
      gmail.users.messages.list({
        userId: "me",
        q: query || undefined,
        maxResults: Math.min(maxResults, this.maxPageSize),
        pageToken,
      })
    );

    const messages = (response.data.messages ?? []).flatMap((message) =>
      message.id ? [{ id: message.id, threadId: message.threadId ?? null }] : []
    );
    return {
      messages,
      nextPageToken: response.data.nextPageToken ?? null,
    };
  }

  async fetchDetails(
    id: string,
    format: DetailFormat
  ): Promise<MatchableMessage> {
    const gmail = this.requireGmail();
    await this.ensureLabels();

    const response = await this.call(`messages.get(${id})`, () =>
      gmail.users.messages.get({
        userId: "me",
        id,
        format,
        metadataHeaders: format === "metadata" ? METADATA_HEADERS : undefined,
      })
    );
    return toMatchableMessage(response.data, this.labelNamesById);
  }

  async batchModifyLabels(
    ids: string[],
    addLabelNames: string[],
    removeLabelNames: string[]
  ): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    const addLabelIds: string[] = [];
    for (const name of addLabelNames) {
      addLabelIds.push(await this.getOrCreateLabel(name));
    }

    const removeLabelIds: string[] = [];
    for (const name of removeLabelNames) {
      const labelId = await this.getLabelId(name);
      if (labelId) {
        removeLabelIds.push(labelId);
      } else {
        logger.warn(`Label '${name}' not found, skipping removal`);
      }
    }

    if (addLabelIds.length === 0 && removeLabelIds.length === 0) {
      logger.debug("No label changes to apply after name resolution");
      return;
    }

    const gmail = this.requireGmail();
    await this.call("messages.batchModify", () =>
      gmail.users.messages.batchModify({
        userId: "me",
        requestBody: { ids, addLabelIds, removeLabelIds },
      })
    );
    logger.debug(`Modified labels on ${ids.length} message(s)`);
  }

  async batchTrash(ids: string[]): Promise<void> {
    await this.batchModifyLabels(ids, ["TRASH"], ["INBOX", "UNREAD"]);
  }

  async batchMark(ids: string[], markAs: "read" | "unread"): Promise<void> {
    if (markAs === "read") {
      await this.batchModifyLabels(ids, [], ["UNREAD"]);
    } else {
      await this.batchModifyLabels(ids, ["UNREAD"], []);
    }
  }

  async batchDelete(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    const gmail = this.requireGmail();
    logger.warn(`Permanently deleting ${ids.length} message(s)`);
    await this.call("messages.batchDelete", () =>
      gmail.users.messages.batchDelete({
        userId: "me",
        requestBody: { ids },
      })
    );
  }
}
