import busboy from "busboy";
import { Readable } from "node:stream";
import { InvalidRequestError } from "@filedock/core/errors";

/** Caps on non-file form fields; together they stay well inside MULTIPART_OVERHEAD. */
const MAX_FIELDS = 16;
const MAX_FIELD_BYTES = 16 * 1024;

export interface MultipartFilePart {
  /** Text fields that arrived before the file part. */
  fields: Record<string, string>;
  filename: string;
  /** The file bytes as they arrive from the client. */
  stream: Readable;
  /** Stops reading the request body, e.g. when the file part is not consumed. */
  discard(): void;
}

/**
 * Parses a multipart body as it streams in and resolves as soon as the
 * part named `fileField` starts, so its bytes can be written out before
 * the client finishes sending them. Fields must precede the file part;
 * fields sent after it are not seen.
 */
export function readMultipartFile(
  body: ReadableStream<Uint8Array>,
  contentType: string,
  fileField = "file",
): Promise<MultipartFilePart> {
  let parser: busboy.Busboy;
  try {
    parser = busboy({
      headers: { "content-type": contentType },
      limits: { fields: MAX_FIELDS, fieldSize: MAX_FIELD_BYTES },
    });
  } catch {
    return Promise.reject(new InvalidRequestError("Malformed multipart content type"));
  }

  const source = Readable.fromWeb(body);
  const discard = () => {
    source.unpipe(parser);
    source.destroy();
    parser.destroy();
  };

  return new Promise<MultipartFilePart>((resolve, reject) => {
    const fields: Record<string, string> = {};
    let started = false;

    parser.on("field", (name, value, info) => {
      if (info.valueTruncated) {
        reject(new InvalidRequestError(`Form field ${name} is too large`));
        discard();
        return;
      }
      fields[name] = value;
    });

    parser.on("file", (name, stream, info) => {
      if (name !== fileField || started) {
        stream.resume();
        return;
      }
      started = true;
      resolve({ fields: { ...fields }, filename: info.filename, stream, discard });
    });

    parser.on("close", () => {
      if (!started) {
        reject(new InvalidRequestError(`${fileField} is required`));
      }
    });

    // After the file part started, busboy also fails the part's stream,
    // so the consumer sees the error through its reads.
    parser.on("error", () => {
      reject(new InvalidRequestError("Malformed multipart body"));
      discard();
    });

    source.on("error", (err) => {
      parser.destroy(err);
    });

    source.pipe(parser);
  });
}
