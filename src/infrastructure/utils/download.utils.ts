/**
 * Streams a remote file to disk.
 * Uses undici so the connect timeout can be raised above Node's default.
 */

import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Agent, fetch } from "undici";

export type Downloader = (url: string, destination: string) => Promise<void>;

const DOWNLOAD_TIMEOUT_MS = 120_000;

export const downloadFile: Downloader = async (url, destination) => {
  const dispatcher = new Agent({ connectTimeout: DOWNLOAD_TIMEOUT_MS });
  try {
    const res = await fetch(url, { dispatcher });
    if (!res.ok || !res.body) {
      throw new Error(`GET ${url} returned HTTP ${res.status}`);
    }
    await pipeline(Readable.fromWeb(res.body), createWriteStream(destination));
  } finally {
    await dispatcher.close();
  }
};
