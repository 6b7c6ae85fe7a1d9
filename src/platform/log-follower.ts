import { createWriteStream } from "node:fs";

/**
 * Copy a multiplexed container log stream into a file until the container
 * exits. Docker frames carry an 8-byte header:
 *   [stream_type(1), 0, 0, 0, size(4 BE)] followed by payload.
 * Resolves once the stream ended and the file is flushed.
 */
export function followLogs(stream: NodeJS.ReadableStream, path: string): Promise<void> {
  const file = createWriteStream(path, { flags: "a" });
  let pending: Buffer = Buffer.alloc(0);

  return new Promise<void>((resolve, reject) => {
    let settled = false;
    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      if (pending.length > 0) file.write(pending);
      file.end(() => (err ? reject(err) : resolve()));
    };

    file.on("error", (err: Error) => {
      settled = true;
      reject(err);
    });

    stream.on("data", (chunk: Buffer | string) => {
      pending = Buffer.concat([pending, typeof chunk === "string" ? Buffer.from(chunk) : chunk]);
      pending = drainFrames(pending, (payload) => file.write(payload));
    });
    stream.on("end", () => finish());
    stream.on("close", () => finish());
    stream.on("error", (err: Error) => finish(err));
  });
}

/** Emit every complete frame of `buf`; return the incomplete remainder. */
export function drainFrames(buf: Buffer, emit: (payload: Buffer) => void): Buffer {
  let offset = 0;
  while (offset + 8 <= buf.length) {
    const size = buf.readUInt32BE(offset + 4);
    if (offset + 8 + size > buf.length) break;
    emit(buf.subarray(offset + 8, offset + 8 + size));
    offset += 8 + size;
  }
  return buf.subarray(offset);
}
