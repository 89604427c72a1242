// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { BridgeError } from "@steno-bridge/core";
import { readFile } from "node:fs/promises";

/**
 * Read the pre-shared key file. Surrounding whitespace (a trailing newline
 * left by an editor) is not part of the key.
 */
export async function loadKeyMaterial(path: string): Promise<string> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (err) {
    throw new BridgeError("INVALID_ARGUMENT", `Cannot read key file: ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const key = contents.trim();
  if (key.length === 0) {
    throw new BridgeError("INVALID_ARGUMENT", `Key file is empty: ${path}`, {
      path,
    });
  }
  return key;
}
