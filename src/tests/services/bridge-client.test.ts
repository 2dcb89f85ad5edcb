import { describe, it, expect, vi, afterEach } from "vitest";
import { ApiError, BridgeClient } from "@/services/bridge-client";
import { decodeWav, encodeWav } from "@/lib/wav-codec";

const BASE_URL = "http://127.0.0.1:8976";

const healthBody = {
  status: "ok",
  model_loaded: true,
  model_type: "turbo",
  device: "cuda",
  error: null,
  inference_count: 3,
  timestamp: 1_700_000_000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function mockFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = responses.shift();
    if (next === undefined) return jsonResponse(healthBody);
    if (next instanceof Error) throw next;
    return next;
  });
  return fetchMock;
}

function requestBody(fetchMock: ReturnType<typeof mockFetch>, call: number): Record<string, unknown> {
  const init = fetchMock.mock.calls[call][1];
  const parsed: unknown = JSON.parse(String(init?.body));
  if (typeof parsed !== "object" || parsed === null) throw new Error("expected a JSON object body");
  return Object.fromEntries(Object.entries(parsed));
}

function inferBody(values: number[], modelUsed = true) {
  return {
    audio: Buffer.from(encodeWav({ samples: new Float32Array(values), sampleRate: 48000 })).toString("base64"),
    sample_rate: 48000,
    num_samples: values.length,
    duration_ms: 12.5,
    model_used: modelUsed,
    model_type: "turbo",
  };
}

describe("BridgeClient", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("checkHealth", () => {
    it("marks a loaded server as model_loaded", async () => {
      const fetchMock = mockFetch(jsonResponse(healthBody));
      const client = new BridgeClient({ fetch: fetchMock });

      await client.checkHealth();

      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/health`);
      const state = client.store.getState();
      expect(state.status).toBe("model_loaded");
      expect(state.isModelLoaded).toBe(true);
      expect(state.remoteDevice).toBe("cuda");
      expect(state.remoteModelType).toBe("turbo");
      expect(state.remoteInferenceCount).toBe(3);
    });

    it("marks a passthrough server as connected", async () => {
      const client = new BridgeClient({ fetch: mockFetch(jsonResponse({ ...healthBody, model_loaded: false })) });

      await client.checkHealth();

      expect(client.store.getState().status).toBe("connected");
    });

    it("records a non-200 answer as an error", async () => {
      const client = new BridgeClient({ fetch: mockFetch(jsonResponse({ error: "boom" }, 500)) });

      await client.checkHealth();

      const state = client.store.getState();
      expect(state.status).toBe("error");
      expect(state.lastError).toBe("Server returned 500: boom");
      expect(state.isModelLoaded).toBe(false);
    });

    it("records a network failure as disconnected", async () => {
      const client = new BridgeClient({ fetch: mockFetch(new TypeError("fetch failed")) });

      await client.checkHealth();

      expect(client.store.getState().status).toBe("disconnected");
      expect(client.store.getState().lastError).toBe("fetch failed");
    });

    it("records an unreadable health body as disconnected", async () => {
      const client = new BridgeClient({ fetch: mockFetch(jsonResponse({ status: "ok" })) });

      await client.checkHealth();

      expect(client.store.getState().status).toBe("disconnected");
      expect(client.store.getState().lastError).toMatch(/^Response decoding failed:/);
    });
  });

  describe("health polling", () => {
    it("checks immediately and then on every interval until stopped", async () => {
      vi.useFakeTimers();
      const fetchMock = mockFetch();
      const client = new BridgeClient({ fetch: fetchMock, healthIntervalMs: 1000 });

      client.startHealthPolling();
      await vi.advanceTimersByTimeAsync(0);
      expect(fetchMock).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(2000);
      expect(fetchMock).toHaveBeenCalledTimes(3);

      client.stopHealthPolling();
      await vi.advanceTimersByTimeAsync(5000);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  describe("infer", () => {
    it("refuses to send while not connected", async () => {
      const fetchMock = mockFetch();
      const client = new BridgeClient({ fetch: fetchMock });

      const error = await client.infer(new Float32Array(4)).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 0, reason: "not_connected", message: "Bridge server not connected" });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("posts the buffer as a WAV and returns the processed audio", async () => {
      const fetchMock = mockFetch(jsonResponse(healthBody), jsonResponse(inferBody([0.5, -0.5])));
      const clock = vi.fn<[], number>().mockReturnValueOnce(100).mockReturnValueOnce(142);
      const client = new BridgeClient({ baseUrl: `${BASE_URL}/`, fetch: fetchMock, clock });
      await client.checkHealth();

      const output = await client.infer(new Float32Array([0.25, -0.25, 0, 0]), {
        sampleRate: 8000,
        prompt: "warm tape",
        denoiseStrength: 0.4,
        inferMethod: "sde",
      });

      expect(fetchMock.mock.calls[1][0]).toBe(`${BASE_URL}/infer`);
      expect(fetchMock.mock.calls[1][1]?.method).toBe("POST");
      const body = requestBody(fetchMock, 1);
      expect(body).toEqual({
        audio: expect.any(String),
        prompt: "warm tape",
        infer_method: "sde",
        denoise_strength: 0.4,
        audio_duration: 0.0005,
      });
      const sent = decodeWav(Buffer.from(String(body.audio), "base64"));
      expect(sent.sampleRate).toBe(8000);
      expect(Array.from(sent.samples)).toEqual([0.25, -0.25, 0, 0]);

      expect(Array.from(output.samples)).toEqual([0.5, -0.5]);
      expect(output.sampleRate).toBe(48000);
      expect(client.store.getState().lastLatencyMs).toBe(42);
    });

    it("sends a zero duration for an empty buffer", async () => {
      const fetchMock = mockFetch(jsonResponse(healthBody), jsonResponse(inferBody([])));
      const client = new BridgeClient({ fetch: fetchMock });
      await client.checkHealth();

      const output = await client.infer(new Float32Array(0));

      expect(requestBody(fetchMock, 1).audio_duration).toBe(0);
      expect(output.samples.length).toBe(0);
    });

    it("passes the server's error message through", async () => {
      const client = new BridgeClient({
        fetch: mockFetch(jsonResponse(healthBody), jsonResponse({ error: "audio: must be base64" }, 400)),
      });
      await client.checkHealth();

      const error = await client.infer(new Float32Array(1)).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 400, reason: "http", message: "audio: must be base64" });
    });

    it("reports undecodable response audio", async () => {
      const client = new BridgeClient({
        fetch: mockFetch(jsonResponse(healthBody), jsonResponse({ ...inferBody([]), audio: "AAAA" })),
      });
      await client.checkHealth();

      const error = await client.infer(new Float32Array(1)).catch((err: unknown) => err);

      expect(error).toMatchObject({
        reason: "decode",
        message: "Invalid audio in response: WAV data too short: 3 bytes (need at least 44)",
      });
    });
  });

  it("getStatus validates the status body", async () => {
    const status = {
      ...healthBody,
      model_path: "/models/ace-turbo",
      sample_rate: 48000,
      buffer_size: 48000,
      version: "0.2.0",
    };
    const { timestamp: _timestamp, ...withoutTimestamp } = status;
    const client = new BridgeClient({ fetch: mockFetch(jsonResponse(withoutTimestamp)) });

    await expect(client.getStatus()).resolves.toMatchObject({ version: "0.2.0", model_path: "/models/ace-turbo" });
  });

  it("shutdown stops polling and disconnects", async () => {
    const fetchMock = mockFetch(jsonResponse(healthBody), jsonResponse({ status: "shutting_down" }));
    const client = new BridgeClient({ fetch: fetchMock });
    await client.checkHealth();

    await expect(client.shutdown()).resolves.toEqual({ status: "shutting_down" });

    expect(fetchMock.mock.calls[1][0]).toBe(`${BASE_URL}/shutdown`);
    expect(client.store.getState().status).toBe("disconnected");
    expect(client.store.getState().lastError).toBeNull();
  });
});
