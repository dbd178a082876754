/**
 * @fileoverview Decoding of the streamed JSON records returned by build, pull and push.
 * The engine reports failures inside the stream, so every record is checked for an
 * embedded error before the operation is considered successful.
 */

import { Readable } from 'node:stream';
import * as core from '@actions/core';
import { isPlainObject } from 'lodash';

/**
 * One record of a streamed engine response.
 */
export type JsonMessage = {
  readonly stream?: string | undefined;
  readonly status?: string | undefined;
  readonly id?: string | undefined;
  readonly progress?: string | undefined;
  readonly progressDetail?: { readonly current?: number | undefined; readonly total?: number | undefined } | undefined;
  readonly aux?: Readonly<Record<string, unknown>> | undefined;
  readonly error?: string | undefined;
  readonly errorDetail?: { readonly code?: number | undefined; readonly message?: string | undefined } | undefined;
};

/**
 * Error embedded in a response stream.
 */
export class JsonMessageError extends Error {
  readonly code: number | undefined;

  constructor(message: string, code?: number) {
    super(message);
    this.name = 'JsonMessageError';
    this.code = code;
  }
}

export type ReadJsonMessagesOptions = {
  /** Called for every decoded record before it is checked for an error. */
  readonly onMessage?: ((message: JsonMessage) => void) | undefined;
  readonly signal?: AbortSignal | undefined;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Narrows a parsed JSON value to a response record.
 */
export function toJsonMessage(value: unknown): JsonMessage {
  if (!isRecord(value)) {
    throw new Error(`Unexpected response record: ${JSON.stringify(value)}`);
  }
  const { progressDetail, aux, errorDetail } = value;

  return {
    stream: readString(value, 'stream'),
    status: readString(value, 'status'),
    id: readString(value, 'id'),
    progress: readString(value, 'progress'),
    progressDetail: isRecord(progressDetail)
      ? { current: readNumber(progressDetail, 'current'), total: readNumber(progressDetail, 'total') }
      : undefined,
    aux: isRecord(aux) ? aux : undefined,
    error: readString(value, 'error'),
    errorDetail: isRecord(errorDetail)
      ? { code: readNumber(errorDetail, 'code'), message: readString(errorDetail, 'message') }
      : undefined,
  };
}

/**
 * Returns the error carried by a record, if any. `errorDetail` takes precedence over `error`.
 */
export function getMessageError(message: JsonMessage): JsonMessageError | undefined {
  if (message.errorDetail) {
    return new JsonMessageError(message.errorDetail.message || message.error || '', message.errorDetail.code);
  }
  if (message.error) {
    return new JsonMessageError(message.error);
  }
  return undefined;
}

/**
 * Decodes a newline-delimited JSON response stream.
 *
 * Reading stops at the first record that carries an error, which is thrown as a
 * {@link JsonMessageError}. Malformed JSON throws the parse error unchanged. Aborting
 * the signal destroys the stream and rejects with the abort reason.
 *
 * @param stream - Response body from the engine.
 * @param options - Record callback and abort signal.
 * @returns All records read.
 */
export async function readJsonMessages(
  stream: NodeJS.ReadableStream,
  options: ReadJsonMessagesOptions = {}
): Promise<ReadonlyArray<JsonMessage>> {
  const { onMessage, signal } = options;
  signal?.throwIfAborted();

  const messages: JsonMessage[] = [];
  const decoder = new TextDecoder('utf-8');
  let buffered = '';

  const processLine = (rawLine: string): void => {
    const line = rawLine.trim();
    if (!line) {
      return;
    }
    const parsed: unknown = JSON.parse(line);
    const message = toJsonMessage(parsed);
    messages.push(message);
    onMessage?.(message);

    const messageError = getMessageError(message);
    if (messageError) {
      throw messageError;
    }
  };

  const onAbort = (): void => {
    if (stream instanceof Readable) {
      stream.destroy(signal?.reason instanceof Error ? signal.reason : new Error('The operation was aborted'));
    }
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    for await (const chunk of stream) {
      buffered += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

      let newlineIndex = buffered.indexOf('\n');
      while (newlineIndex >= 0) {
        processLine(buffered.slice(0, newlineIndex));
        buffered = buffered.slice(newlineIndex + 1);
        newlineIndex = buffered.indexOf('\n');
      }
    }
    signal?.throwIfAborted();
    processLine(buffered + decoder.decode());
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  return messages;
}

/**
 * Consumes a response stream and throws if it carries an error.
 */
export async function detectErrorMessage(stream: NodeJS.ReadableStream, signal?: AbortSignal): Promise<void> {
  await readJsonMessages(stream, { signal });
}

/**
 * Returns the last string value of an `aux` key, e.g. `ID` after a build or `Digest` after a push.
 */
export function findAuxValue(messages: ReadonlyArray<JsonMessage>, key: string): string | undefined {
  return messages.reduce<string | undefined>((found, message) => {
    const value = message.aux?.[key];
    return typeof value === 'string' ? value : found;
  }, undefined);
}

/**
 * Logs a response record: build output at info level, progress at debug level.
 */
export function logJsonMessage(message: JsonMessage): void {
  if (message.stream !== undefined) {
    const output = message.stream.trimEnd();
    if (output) {
      core.info(output);
    }
    return;
  }
  if (message.status !== undefined) {
    const prefix = message.id ? `${message.id}: ` : '';
    const suffix = message.progress ? ` ${message.progress}` : '';
    core.debug(`${prefix}${message.status}${suffix}`);
  }
}
