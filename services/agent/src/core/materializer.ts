import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { FastifyBaseLogger } from "fastify";
import { DEFAULT_FILE_MODE, type FileSpec } from "@satchel/schemas";
import { dirMode } from "./dir-mode";
import { MaterializationError } from "./errors";
import type { LifecycleState } from "./lifecycle-state";
import type { NotificationDispatcher } from "./notifications";
import { renderFile, validateTemplateSource } from "./template";

interface FileMaterializerDeps {
  state: LifecycleState;
  dispatcher: NotificationDispatcher;
  logger?: FastifyBaseLogger;
}

export interface MaterializeResult {
  path: string;
  bytes: number;
  secretsUsed: string[];
}

/**
 * Renders a configured file from the secrets held in the lifecycle state and
 * writes it to disk with its mode. The secrets a render reads are registered
 * against the file only once the render has succeeded.
 */
export class FileMaterializer {
  constructor(private readonly deps: FileMaterializerDeps) {}

  async materialize(file: FileSpec): Promise<MaterializeResult> {
    validateTemplateSource(file);
    const mode = file.mode || DEFAULT_FILE_MODE;

    try {
      await fs.mkdir(path.dirname(file.path), { recursive: true, mode: dirMode(mode) });
    } catch (err) {
      throw new MaterializationError(file.path, `couldn't create directory for ${file.path}`, err);
    }

    const used = new Set<string>();
    const content = await renderFile(file, (name, key) => {
      const secret = this.deps.state.getSecret(name);
      if (!secret) {
        throw new Error(`unknown secret: ${name}`);
      }
      if (!Object.hasOwn(secret.data, key)) {
        throw new Error(`unknown key in secret '${name}': ${key}`);
      }
      used.add(name);
      return secret.data[key];
    });

    this.deps.state.commitUsages(file.path, file.priority, used);
    await writeFileWithMode(file.path, content, mode, this.deps.logger);

    const bytes = Buffer.byteLength(content, "utf-8");
    this.deps.logger?.info({ path: file.path, bytes, mode: mode.toString(8) }, "agent: file written");
    this.deps.dispatcher.markPending(...file.notify);

    return { path: file.path, bytes, secretsUsed: Array.from(used) };
  }
}

async function writeFileWithMode(
  filePath: string,
  content: string,
  mode: number,
  logger?: FastifyBaseLogger
): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, "w", mode);
  } catch (err) {
    throw new MaterializationError(filePath, `couldn't open ${filePath}`, err);
  }

  try {
    try {
      await handle.chmod(mode);
    } catch (err) {
      throw new MaterializationError(filePath, `couldn't set mode of ${filePath}`, err);
    }
    try {
      await handle.writeFile(content, "utf-8");
    } catch (err) {
      throw new MaterializationError(filePath, `couldn't write ${filePath}`, err);
    }
    try {
      await handle.sync();
    } catch (err) {
      throw new MaterializationError(filePath, `not able to commit ${filePath}`, err);
    }
  } catch (err) {
    // the write error is the one reported
    await handle.close().catch((closeErr: unknown) => {
      logger?.warn({ err: closeErr, path: filePath }, "agent: couldn't close file after failed write");
    });
    throw err;
  }

  try {
    await handle.close();
  } catch (err) {
    throw new MaterializationError(filePath, `couldn't close ${filePath}`, err);
  }
}
