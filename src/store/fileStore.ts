import * as fs from "node:fs";
import * as path from "node:path";
import type { AppchainSnapshot } from "../core/types";
import { decodeSnapshot, encodeSnapshot } from "../codec/snapshot";
import type { StateStore } from "./types";

/** RLP snapshot on disk, replaced through a temp file and a rename. */
export class FileStateStore implements StateStore {
  constructor(private readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  load(): AppchainSnapshot | undefined {
    if (!fs.existsSync(this.filePath)) return undefined;
    return decodeSnapshot(new Uint8Array(fs.readFileSync(this.filePath)));
  }

  save(snapshot: AppchainSnapshot): void {
    const tmp = this.filePath + ".tmp";
    fs.writeFileSync(tmp, encodeSnapshot(snapshot));
    fs.renameSync(tmp, this.filePath);
  }
}
