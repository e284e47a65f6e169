import fs from "node:fs";
import path from "node:path";
import { attachmentFilename } from "./filenames";
import { deriveAttachmentKey } from "./identifiers";
import { ExistenceIndex, StoreAttachmentOptions } from "./types";

interface AttachmentStoreDeps {
  directory: string;
  index: ExistenceIndex;
  dropQueryKeys?: readonly string[];
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function writeIfAbsent(filePath: string, bytes: Uint8Array): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.promises.writeFile(filePath, bytes, { flag: "wx" });
  } catch (error) {
    // same filename reached through another URL: keep the bytes already there
    if (!isAlreadyExists(error)) {
      throw error;
    }
  }
}

/** Write-once storage of one source's binary attachments, keyed by canonical URL. */
export class AttachmentStore {
  private readonly directory: string;
  private readonly index: ExistenceIndex;
  private readonly dropQueryKeys?: readonly string[];

  constructor(deps: AttachmentStoreDeps) {
    this.directory = path.resolve(deps.directory);
    this.index = deps.index;
    this.dropQueryKeys = deps.dropQueryKeys;
  }

  keyFor(attachmentUrl: string): string {
    return deriveAttachmentKey(attachmentUrl, this.dropQueryKeys);
  }

  async has(attachmentUrl: string): Promise<boolean> {
    return this.index.hasAttachment(this.keyFor(attachmentUrl));
  }

  async pathFor(attachmentUrl: string): Promise<string | undefined> {
    return this.index.attachmentPath(this.keyFor(attachmentUrl));
  }

  async store(
    documentId: string,
    attachmentUrl: string,
    bytes: Uint8Array,
    options: StoreAttachmentOptions = {},
  ): Promise<string> {
    const key = this.keyFor(attachmentUrl);
    const previous = await this.index.attachmentPath(key);
    if (previous !== undefined) {
      if (!fs.existsSync(previous)) {
        await writeIfAbsent(previous, bytes);
      }
      return previous;
    }

    const filename = attachmentFilename(attachmentUrl, documentId, options.extension ?? "pdf", options.sequenceHint);
    const target = path.join(this.directory, filename);
    await writeIfAbsent(target, bytes);
    await this.index.markAttachmentSeen(key, target);
    return target;
  }
}
