/**
 * RIFF/WAVE codec for bridge transport.
 *
 * Decoding accepts IEEE float32, PCM16 and PCM24 in any channel count and
 * folds it down to mono. Encoding always writes mono float32, so a buffer
 * survives an encode/decode round trip bit for bit.
 */

import { WavFormatCode } from "@/types/audio";
import type { AudioBuffer, WavErrorCode, WavInfo } from "@/types/audio";

const HEADER_BYTES = 44;
const FMT_CHUNK_BYTES = 16;

export class WavDecodeError extends Error {
  constructor(
    public code: WavErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "WavDecodeError";
  }
}

interface ParsedContainer {
  view: DataView;
  info: WavInfo;
  dataOffset: number;
}

function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3),
  );
}

function writeTag(view: DataView, offset: number, tag: string): void {
  for (let i = 0; i < tag.length; i++) {
    view.setUint8(offset + i, tag.charCodeAt(i));
  }
}

function parseContainer(bytes: Uint8Array): ParsedContainer {
  if (bytes.byteLength < HEADER_BYTES) {
    throw new WavDecodeError(
      "MalformedContainer",
      `WAV data too short: ${bytes.byteLength} bytes (need at least ${HEADER_BYTES})`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const riff = readTag(view, 0);
  const wave = readTag(view, 8);
  if (riff !== "RIFF" || wave !== "WAVE") {
    throw new WavDecodeError("InvalidMagic", `Not a WAV file (RIFF=${riff}, WAVE=${wave})`);
  }

  let fmt: Omit<WavInfo, "dataBytes"> | null = null;
  let dataOffset = -1;
  let dataBytes = 0;

  let pos = 12;
  while (pos + 8 <= view.byteLength) {
    const chunkId = readTag(view, pos);
    const chunkSize = view.getUint32(pos + 4, true);
    const body = pos + 8;

    if (chunkId === "fmt ") {
      if (chunkSize < FMT_CHUNK_BYTES || body + FMT_CHUNK_BYTES > view.byteLength) {
        throw new WavDecodeError("MalformedContainer", `Truncated fmt chunk (${chunkSize} bytes)`);
      }
      fmt = {
        audioFormat: view.getUint16(body, true),
        channels: view.getUint16(body + 2, true),
        sampleRate: view.getUint32(body + 4, true),
        bitsPerSample: view.getUint16(body + 14, true),
      };
    } else if (chunkId === "data") {
      if (!fmt) {
        throw new WavDecodeError("MissingChunk", "data chunk appears before fmt chunk");
      }
      dataOffset = body;
      // A streaming writer may leave the size unpatched; read what is there.
      dataBytes = Math.min(chunkSize, view.byteLength - body);
      break;
    }

    // Chunks are word aligned: odd sizes carry one pad byte.
    pos = body + chunkSize + (chunkSize & 1);
  }

  if (!fmt || dataOffset < 0) {
    throw new WavDecodeError(
      "MissingChunk",
      `Missing ${fmt ? "data" : "fmt"} chunk in WAV`,
    );
  }

  return { view, info: { ...fmt, dataBytes }, dataOffset };
}

type SampleReader = (view: DataView, offset: number) => number;

function sampleReaderFor(info: WavInfo): SampleReader | null {
  const { audioFormat, bitsPerSample } = info;
  if (audioFormat === WavFormatCode.IEEE_FLOAT && bitsPerSample === 32) {
    return (view, offset) => view.getFloat32(offset, true);
  }
  if (audioFormat === WavFormatCode.PCM && bitsPerSample === 16) {
    return (view, offset) => view.getInt16(offset, true) / 32768;
  }
  if (audioFormat === WavFormatCode.PCM && bitsPerSample === 24) {
    return (view, offset) => {
      const raw =
        view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getUint8(offset + 2) << 16);
      // Shift the sign bit into bit 31 and back to sign-extend.
      return ((raw << 8) >> 8) / 8388608;
    };
  }
  return null;
}

/** Reads the format descriptor without decoding any samples. */
export function readWavInfo(bytes: Uint8Array): WavInfo {
  return parseContainer(bytes).info;
}

/**
 * Decodes a WAV container to mono float samples.
 * Multichannel frames are averaged; a trailing partial frame is dropped.
 */
export function decodeWav(bytes: Uint8Array): AudioBuffer {
  const { view, info, dataOffset } = parseContainer(bytes);

  const read = sampleReaderFor(info);
  if (!read || info.channels === 0) {
    throw new WavDecodeError(
      "UnsupportedFormat",
      `Unsupported WAV format: audio_format=${info.audioFormat}, bits=${info.bitsPerSample}, channels=${info.channels}`,
    );
  }

  const bytesPerSample = info.bitsPerSample / 8;
  const frameBytes = bytesPerSample * info.channels;
  const frameCount = Math.floor(info.dataBytes / frameBytes);
  const samples = new Float32Array(frameCount);

  for (let frame = 0; frame < frameCount; frame++) {
    const frameOffset = dataOffset + frame * frameBytes;
    let sum = 0;
    for (let ch = 0; ch < info.channels; ch++) {
      sum += read(view, frameOffset + ch * bytesPerSample);
    }
    samples[frame] = sum / info.channels;
  }

  return { samples, sampleRate: info.sampleRate };
}

interface HeaderFields {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  dataBytes: number;
}

function writeHeader(view: DataView, fields: HeaderFields): void {
  const blockAlign = fields.channels * (fields.bitsPerSample / 8);

  writeTag(view, 0, "RIFF");
  view.setUint32(4, 36 + fields.dataBytes, true);
  writeTag(view, 8, "WAVE");

  writeTag(view, 12, "fmt ");
  view.setUint32(16, FMT_CHUNK_BYTES, true);
  view.setUint16(20, fields.audioFormat, true);
  view.setUint16(22, fields.channels, true);
  view.setUint32(24, fields.sampleRate, true);
  view.setUint32(28, fields.sampleRate * blockAlign, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, fields.bitsPerSample, true);

  writeTag(view, 36, "data");
  view.setUint32(40, fields.dataBytes, true);
}

/** Encodes mono samples as a 32-bit IEEE float WAV. Samples are not clamped. */
export function encodeWav(buffer: AudioBuffer): Uint8Array {
  const { samples, sampleRate } = buffer;
  const dataBytes = samples.length * 4;
  const out = new ArrayBuffer(HEADER_BYTES + dataBytes);
  const view = new DataView(out);

  writeHeader(view, {
    audioFormat: WavFormatCode.IEEE_FLOAT,
    channels: 1,
    sampleRate,
    bitsPerSample: 32,
    dataBytes,
  });

  let offset = HEADER_BYTES;
  for (let i = 0; i < samples.length; i++) {
    view.setFloat32(offset, samples[i], true);
    offset += 4;
  }

  return new Uint8Array(out);
}

function clamp(v: number): number {
  return Math.max(-1, Math.min(1, v));
}

export interface Pcm16EncodeOptions {
  /** The mono signal is copied to every channel. Defaults to 1. */
  channels?: number;
}

/**
 * Encodes mono samples as 16-bit PCM, clamped to [-1, 1] and scaled by 32767.
 */
export function encodePcm16Wav(buffer: AudioBuffer, options: Pcm16EncodeOptions = {}): Uint8Array {
  const channels = options.channels ?? 1;
  if (!Number.isInteger(channels) || channels < 1) {
    throw new RangeError(`channels must be a positive integer, got ${channels}`);
  }

  const { samples, sampleRate } = buffer;
  const dataBytes = samples.length * channels * 2;
  const out = new ArrayBuffer(HEADER_BYTES + dataBytes);
  const view = new DataView(out);

  writeHeader(view, {
    audioFormat: WavFormatCode.PCM,
    channels,
    sampleRate,
    bitsPerSample: 16,
    dataBytes,
  });

  let offset = HEADER_BYTES;
  for (let i = 0; i < samples.length; i++) {
    const value = Math.trunc(clamp(samples[i]) * 32767);
    for (let ch = 0; ch < channels; ch++) {
      view.setInt16(offset, value, true);
      offset += 2;
    }
  }

  return new Uint8Array(out);
}
