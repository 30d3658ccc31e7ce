import * as fs from "node:fs";
import * as path from "node:path";
import { stringify as yamlStringify } from "yaml";
import { errorMessage } from "./errors.js";
import type { StateDatabase } from "./state.js";
import type { Logger, MessageRecord, TransformOptions, Transformer } from "./types.js";

export const MARKDOWN_TRANSFORM = "markdown";
export const MARKDOWN_DIR = "markdown";
export const TRANSFORM_CONFIG_VERSION = "1";

export interface MarkdownCardTransformerOptions {
  rootDir: string;
  state: StateDatabase;
  logger: Logger;
  configVersion?: string;
}

function parseRecipients(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed)
      ? parsed.filter((r): r is string => typeof r === "string")
      : [];
  } catch {
    return [raw];
  }
}

/** `eml/Inbox/2024/03/Hello_1030.eml` → `markdown/Inbox/2024/03/Hello_1030.md` */
export function markdownPathFor(artifactPath: string): string {
  const withoutRoot = artifactPath.replace(/^eml\//, "");
  const ext = path.posix.extname(withoutRoot);
  const stem = ext ? withoutRoot.slice(0, -ext.length) : withoutRoot;
  return `${MARKDOWN_DIR}/${stem}.md`;
}

export function renderMessageCard(message: MessageRecord, markdownPath: string): string {
  const frontmatter: Record<string, unknown> = {
    subject: message.subject ?? "(no subject)",
    from: message.sender ?? undefined,
    to: parseRecipients(message.recipients),
    received: message.receivedAt,
    folder: message.folderPath,
    source: message.localPath,
  };
  if (message.conversationId) frontmatter.conversation = message.conversationId;
  if (message.hasAttachments) frontmatter.attachments = true;

  const link = path.posix.relative(path.posix.dirname(markdownPath), message.localPath);
  const fm = yamlStringify(frontmatter).trim();
  return `---\n${fm}\n---\n\n# ${message.subject ?? "(no subject)"}\n\n[Original message](${encodeURI(link)})\n`;
}

/**
 * Writes a small Markdown card beside the archive for each stored message
 * and records it in `transformations`.
 */
export class MarkdownCardTransformer implements Transformer {
  private readonly rootDir: string;
  private readonly state: StateDatabase;
  private readonly logger: Logger;
  private readonly configVersion: string;

  constructor(opts: MarkdownCardTransformerOptions) {
    this.rootDir = opts.rootDir;
    this.state = opts.state;
    this.logger = opts.logger;
    this.configVersion = opts.configVersion ?? TRANSFORM_CONFIG_VERSION;
  }

  async transformSingleMessage(
    message: MessageRecord,
    options: TransformOptions,
  ): Promise<boolean> {
    if (!options.markdown) return true;

    const relativePath = markdownPathFor(message.localPath);
    try {
      const filePath = path.join(this.rootDir, relativePath);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const tmp = `${filePath}.tmp`;
      fs.writeFileSync(tmp, renderMessageCard(message, relativePath));
      fs.renameSync(tmp, filePath);

      this.state.upsertTransformation({
        messageId: message.mutableId,
        type: MARKDOWN_TRANSFORM,
        appliedAt: new Date().toISOString(),
        configVersion: this.configVersion,
        outputPath: relativePath,
      });
      return true;
    } catch (err) {
      this.logger.warn(`Markdown card failed for ${message.localPath}`, {
        error: errorMessage(err),
      });
      return false;
    }
  }
}
