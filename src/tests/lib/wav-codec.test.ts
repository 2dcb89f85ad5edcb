import { describe, it, expect } from "vitest";
import {
  WavDecodeError,
  decodeWav,
  encodePcm16Wav,
  encodeWav,
  readWavInfo,
} from "@/lib/wav-codec";
import type { WavErrorCode } from "@/types/audio";
import {
  dataChunk,
  float32Bytes,
  fmtChunk,
  int16Bytes,
  int24Bytes,
  riff,
} from "../fixtures/wav";

function decodeErrorCode(bytes: Uint8Array): WavErrorCode | null {
  try {
    decodeWav(bytes);
    return null;
  } catch (err) {
    if (err instanceof WavDecodeError) return err.code;
    throw err;
  }
}

function tagAt(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(...bytes.subarray(offset, offset + 4));
}

const PCM16_MONO = { audioFormat: 1, channels: 1, sampleRate: 44100, bitsPerSample: 16 };

describe("encodeWav / decodeWav", () => {
  it.each([0, 1, 48000])("round-trips %i samples", (length) => {
    const samples = new Float32Array(length);
    for (let i = 0; i < length; i++) {
      samples[i] = Math.sin((2 * Math.PI * 440 * i) / 48000) * 0.8;
    }

    const decoded = decodeWav(encodeWav({ samples, sampleRate: 48000 }));

    expect(decoded.sampleRate).toBe(48000);
    expect(decoded.samples.length).toBe(length);
    let maxError = 0;
    for (let i = 0; i < length; i++) {
      maxError = Math.max(maxError, Math.abs(decoded.samples[i] - samples[i]));
    }
    expect(maxError).toBeLessThanOrEqual(1e-5);
  });

  it("writes a 44-byte float32 mono header", () => {
    const wav = encodeWav({ samples: new Float32Array([0.25, -0.5, 1.5]), sampleRate: 22050 });
    const view = new DataView(wav.buffer);

    expect(wav.byteLength).toBe(44 + 12);
    expect(tagAt(wav, 0)).toBe("RIFF");
    expect(view.getUint32(4, true)).toBe(36 + 12);
    expect(tagAt(wav, 8)).toBe("WAVE");
    expect(tagAt(wav, 12)).toBe("fmt ");
    expect(view.getUint32(16, true)).toBe(16);
    expect(view.getUint16(20, true)).toBe(3);
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(22050);
    expect(view.getUint32(28, true)).toBe(22050 * 4);
    expect(view.getUint16(32, true)).toBe(4);
    expect(view.getUint16(34, true)).toBe(32);
    expect(tagAt(wav, 36)).toBe("data");
    expect(view.getUint32(40, true)).toBe(12);
  });

  it("does not clamp out-of-range float samples", () => {
    const decoded = decodeWav(encodeWav({ samples: new Float32Array([1.5, -2]), sampleRate: 48000 }));
    expect(Array.from(decoded.samples)).toEqual([1.5, -2]);
  });

  it("decodes from a view into a larger buffer", () => {
    const wav = encodeWav({ samples: new Float32Array([0.5, -0.25]), sampleRate: 48000 });
    const padded = new Uint8Array(wav.byteLength + 10);
    padded.set(wav, 5);

    const decoded = decodeWav(padded.subarray(5, 5 + wav.byteLength));
    expect(Array.from(decoded.samples)).toEqual([0.5, -0.25]);
  });
});

describe("decodeWav formats", () => {
  it("scales PCM16 by 1/32768", () => {
    const wav = riff([fmtChunk(PCM16_MONO), dataChunk(int16Bytes([16384, -32768, 32767]))]);
    const decoded = decodeWav(wav);

    expect(decoded.sampleRate).toBe(44100);
    expect(Array.from(decoded.samples)).toEqual([0.5, -1, Math.fround(32767 / 32768)]);
  });

  it("sign-extends PCM24", () => {
    const wav = riff([
      fmtChunk({ audioFormat: 1, channels: 1, sampleRate: 48000, bitsPerSample: 24 }),
      dataChunk(int24Bytes([0x400000, -8388608, -1])),
    ]);
    const decoded = decodeWav(wav);

    expect(Array.from(decoded.samples)).toEqual([0.5, -1, Math.fround(-1 / 8388608)]);
  });

  it("averages stereo frames to mono", () => {
    const wav = riff([
      fmtChunk({ ...PCM16_MONO, channels: 2 }),
      dataChunk(int16Bytes([16384, 0, -16384, -16384])),
    ]);
    const decoded = decodeWav(wav);

    expect(Array.from(decoded.samples)).toEqual([0.25, -0.5]);
  });

  it("drops a trailing partial frame", () => {
    const wav = riff([
      fmtChunk({ audioFormat: 3, channels: 2, sampleRate: 48000, bitsPerSample: 32 }),
      dataChunk(float32Bytes([0.5, 0.5, 0.25])),
    ]);
    expect(Array.from(decodeWav(wav).samples)).toEqual([0.5]);
  });

  it("skips unknown chunks, including odd-sized ones with a pad byte", () => {
    const wav = riff([
      fmtChunk(PCM16_MONO),
      { id: "LIST", body: new Uint8Array(4) },
      { id: "junk", body: new Uint8Array([1, 2, 3]) },
      dataChunk(int16Bytes([16384])),
    ]);
    expect(Array.from(decodeWav(wav).samples)).toEqual([0.5]);
  });

  it("reads what is present when the data size overruns the buffer", () => {
    const wav = riff([fmtChunk(PCM16_MONO), dataChunk(int16Bytes([16384, 8192, 0, 0]), 1000)]);
    expect(decodeWav(wav).samples.length).toBe(4);
  });

  it("accepts an empty data chunk", () => {
    const wav = riff([fmtChunk(PCM16_MONO), dataChunk(new Uint8Array(0))]);
    expect(wav.byteLength).toBe(44);
    expect(decodeWav(wav).samples.length).toBe(0);
  });
});

describe("decodeWav errors", () => {
  it("rejects buffers shorter than a header", () => {
    expect(() => decodeWav(new Uint8Array(43))).toThrow(WavDecodeError);
    expect(decodeErrorCode(new Uint8Array(43))).toBe("MalformedContainer");
  });

  it("rejects a missing RIFF or WAVE tag", () => {
    const base = [fmtChunk(PCM16_MONO), dataChunk(int16Bytes([0, 0, 0, 0]))];
    expect(decodeErrorCode(riff(base, { riff: "RIFX", wave: "WAVE" }))).toBe("InvalidMagic");
    expect(decodeErrorCode(riff(base, { riff: "RIFF", wave: "AVI " }))).toBe("InvalidMagic");
  });

  it("rejects a file without a data chunk", () => {
    const wav = riff([fmtChunk(PCM16_MONO), { id: "LIST", body: new Uint8Array(8) }]);
    expect(decodeErrorCode(wav)).toBe("MissingChunk");
  });

  it("rejects a data chunk ahead of the fmt chunk", () => {
    const wav = riff([dataChunk(int16Bytes([0, 0])), fmtChunk(PCM16_MONO)]);
    expect(decodeErrorCode(wav)).toBe("MissingChunk");
  });

  it("rejects a short fmt chunk", () => {
    const wav = riff([
      { id: "fmt ", body: new Uint8Array(12) },
      dataChunk(int16Bytes([0, 0, 0, 0, 0, 0])),
    ]);
    expect(decodeErrorCode(wav)).toBe("MalformedContainer");
  });

  it.each([
    { audioFormat: 1, bitsPerSample: 8 },
    { audioFormat: 3, bitsPerSample: 64 },
    { audioFormat: 6, bitsPerSample: 16 },
  ])("rejects format $audioFormat at $bitsPerSample bits", ({ audioFormat, bitsPerSample }) => {
    const wav = riff([
      fmtChunk({ audioFormat, channels: 1, sampleRate: 8000, bitsPerSample }),
      dataChunk(new Uint8Array(16)),
    ]);
    expect(decodeErrorCode(wav)).toBe("UnsupportedFormat");
  });

  it("rejects zero channels", () => {
    const wav = riff([fmtChunk({ ...PCM16_MONO, channels: 0 }), dataChunk(new Uint8Array(8))]);
    expect(decodeErrorCode(wav)).toBe("UnsupportedFormat");
  });
});

describe("readWavInfo", () => {
  it("reports the format without decoding", () => {
    const wav = riff([
      fmtChunk({ audioFormat: 1, channels: 2, sampleRate: 96000, bitsPerSample: 24 }),
      dataChunk(new Uint8Array(12)),
    ]);
    expect(readWavInfo(wav)).toEqual({
      audioFormat: 1,
      channels: 2,
      sampleRate: 96000,
      bitsPerSample: 24,
      dataBytes: 12,
    });
  });
});

describe("encodePcm16Wav", () => {
  it("clamps and truncates toward zero", () => {
    const wav = encodePcm16Wav({ samples: new Float32Array([0.5, -1, 1.5, -2, 0]), sampleRate: 8000 });
    const view = new DataView(wav.buffer);

    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint16(34, true)).toBe(16);
    const values = [0, 1, 2, 3, 4].map((i) => view.getInt16(44 + i * 2, true));
    expect(values).toEqual([16383, -32767, 32767, -32767, 0]);
  });

  it("copies the mono signal to every channel", () => {
    const wav = encodePcm16Wav({ samples: new Float32Array([0.25, -0.25]), sampleRate: 8000 }, { channels: 2 });
    const view = new DataView(wav.buffer);

    expect(wav.byteLength).toBe(44 + 8);
    expect(view.getUint16(22, true)).toBe(2);
    expect(view.getUint32(28, true)).toBe(8000 * 4);
    expect(view.getUint16(32, true)).toBe(4);
    const values = [0, 1, 2, 3].map((i) => view.getInt16(44 + i * 2, true));
    expect(values).toEqual([8191, 8191, -8191, -8191]);
  });

  it("rejects a channel count below one", () => {
    expect(() => encodePcm16Wav({ samples: new Float32Array(1), sampleRate: 8000 }, { channels: 0 })).toThrow(
      RangeError,
    );
  });
});
