/**
 * Client for the remote image generation service.
 *
 * Normalizes parameters, posts them with the service's headers and decodes
 * the answer: a ZIP archive for legacy models, length-prefixed msgpack frames
 * for current ones. Transport is the global `fetch` unless one is injected.
 *
 * Usage:
 *   const client = new ImageGenerationClient({ token: env.NAI_TOKEN });
 *   const [image] = await client.generateImage({ prompt: "1girl, cute" });
 *
 *   for await (const event of client.streamImage({ prompt: "1girl, cute" })) {
 *     if (event.kind === "final") await saveImage(event.image, "output");
 *   }
 */

import { createHash } from "crypto";
import { createLogger } from "../../config/logger";
import type { DirectorTool, Emotion, EmotionLevel } from "../../models/director";
import type { Image, StreamEvent } from "../../models/events";
import { ENDPOINTS, HOSTS, MODELS, isV4Model } from "../../models/constants";
import type { GenerationParams, NormalizedRequest } from "../../models/generation";
import { extractArchive, extractFinalImages, extractFirstEntry, filenameTimestamp, StreamEventParser } from "../decoding";
import type { Clock } from "../decoding";
import { buildDirectorRequest } from "../director";
import { FormatFailure, TimeoutFailure, ValidationFailure } from "../errors";
import { buildRequestPayload, estimateCost, normalizeMetadata } from "../generation";
import { prepareImage, type ImageSource } from "../imageInput";
import { buildHeaders, failureForStatus, formatErrorDetail, toTransportFailure } from "./http";
import { StaticTokenProvider } from "./tokenProvider";
import type { AccessTokenProvider, ClientOptions, FetchLike } from "./types";

const log = createLogger("client");

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_VIBE_EXTRACTION = 1.0;

export class ImageGenerationClient {
  private readonly tokenProvider: AccessTokenProvider;
  private readonly host: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly verbose: boolean;
  private readonly isOpus: boolean;
  private readonly now: Clock;
  private readonly randomSeed?: () => number;

  /** Vibe tokens keyed by image hash, extraction strength and model. */
  private readonly vibeCache = new Map<string, string>();

  constructor(options: ClientOptions = {}) {
    this.tokenProvider = options.tokenProvider ?? new StaticTokenProvider(options.token ?? "");
    this.host = (options.host ?? HOSTS.WEB).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.verbose = options.verbose ?? false;
    this.isOpus = options.isOpus ?? false;
    this.now = options.now ?? (() => new Date());
    this.randomSeed = options.randomSeed;
  }

  // -------------------------------------------------------------------------
  // Generation
  // -------------------------------------------------------------------------

  /** Normalize with this client's seed source. */
  normalize(params: GenerationParams): NormalizedRequest {
    return normalizeMetadata(params, { randomSeed: this.randomSeed });
  }

  /**
   * Generate and return every final image.
   *
   * Accepts sparse parameters or an already normalized request.
   */
  async generateImage(params: GenerationParams): Promise<Image[]> {
    const request = await this.prepare(params);

    if (isV4Model(request.model)) {
      const response = await this.post(ENDPOINTS.IMAGE_STREAM, buildRequestPayload(request));
      return extractFinalImages(await this.readBytes(response), this.now);
    }

    const response = await this.post(ENDPOINTS.IMAGE, buildRequestPayload(request));
    return extractArchive(await this.readBytes(response), this.now);
  }

  /**
   * Generate with a current-protocol model and yield intermediate and final
   * events as their frames arrive. Stopping the iteration cancels the body.
   */
  async *streamImage(params: GenerationParams): AsyncGenerator<StreamEvent, void, undefined> {
    const request = await this.prepare(params);
    if (!isV4Model(request.model)) {
      throw new ValidationFailure("model", `Streaming is not available for ${request.model}`);
    }

    const response = await this.post(ENDPOINTS.IMAGE_STREAM, buildRequestPayload(request));
    const parser = new StreamEventParser(this.now);

    for await (const chunk of this.readChunks(response, "Reading the image stream")) {
      yield* parser.feedChunk(chunk);
    }

    if (parser.pendingBytes > 0) {
      log.warn("Image stream ended inside a frame", { pendingBytes: parser.pendingBytes });
    }
  }

  private async prepare(params: GenerationParams): Promise<NormalizedRequest> {
    const request = this.normalize(params);

    if (this.verbose) {
      log.info("Generating image", {
        model: request.model,
        action: request.action,
        width: request.width,
        height: request.height,
        n_samples: request.n_samples,
        estimatedCost: estimateCost(request, { isOpus: this.isOpus }),
      });
    }

    return this.encodeVibe(request);
  }

  // -------------------------------------------------------------------------
  // Vibe transfer
  // -------------------------------------------------------------------------

  /**
   * The v4 curated model takes encoded vibe tokens instead of raw reference
   * images. Returns a request whose reference images are the tokens (base64)
   * and whose extraction list is dropped; other requests come back unchanged.
   */
  async encodeVibe(request: NormalizedRequest): Promise<NormalizedRequest> {
    const images = request.reference_image_multiple;
    if (request.model !== MODELS.V4_CUR || !images || images.length === 0) {
      return request;
    }

    const tokens: string[] = [];
    for (const [i, image] of images.entries()) {
      const informationExtracted = request.reference_information_extracted_multiple?.[i] ?? DEFAULT_VIBE_EXTRACTION;
      const imageHash = createHash("sha256").update(Buffer.from(image, "base64")).digest("hex");
      const cacheKey = `${imageHash}:${informationExtracted}:${request.model}`;

      let token = this.vibeCache.get(cacheKey);
      if (token === undefined) {
        log.debug("Encoding new vibe token", { index: i });
        const response = await this.post(ENDPOINTS.ENCODE_VIBE, {
          image,
          information_extracted: informationExtracted,
          model: request.model,
        });
        const bytes = await this.readBytes(response);
        if (bytes.length === 0) {
          throw new FormatFailure("Received empty vibe token from the image service");
        }
        token = bytes.toString("base64");
        this.vibeCache.set(cacheKey, token);
      } else {
        log.debug("Using cached vibe token", { index: i });
      }

      tokens.push(token);
    }

    return Object.freeze({
      ...request,
      reference_image_multiple: Object.freeze(tokens),
      reference_information_extracted_multiple: undefined,
    });
  }

  // -------------------------------------------------------------------------
  // Director tools
  // -------------------------------------------------------------------------

  /** Run a director tool on an image; the result is named `YYYYMMDD_HHMMSS_{tool}.png`. */
  async useDirectorTool(tool: DirectorTool, source: ImageSource): Promise<Image> {
    const request = buildDirectorRequest(tool, await prepareImage(source));
    const response = await this.post(ENDPOINTS.DIRECTOR, request);
    const data = extractFirstEntry(await this.readBytes(response));

    return { filename: `${filenameTimestamp(this.now())}_${tool.kind}.png`, data };
  }

  lineart(source: ImageSource): Promise<Image> {
    return this.useDirectorTool({ kind: "lineart" }, source);
  }

  sketch(source: ImageSource): Promise<Image> {
    return this.useDirectorTool({ kind: "sketch" }, source);
  }

  backgroundRemoval(source: ImageSource): Promise<Image> {
    return this.useDirectorTool({ kind: "bg-removal" }, source);
  }

  declutter(source: ImageSource): Promise<Image> {
    return this.useDirectorTool({ kind: "declutter" }, source);
  }

  colorize(source: ImageSource, prompt?: string, defry?: number): Promise<Image> {
    return this.useDirectorTool({ kind: "colorize", prompt, defry }, source);
  }

  changeEmotion(source: ImageSource, emotion: Emotion, prompt?: string, level?: EmotionLevel): Promise<Image> {
    return this.useDirectorTool({ kind: "emotion", emotion, prompt, level }, source);
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  /** Rejects with TimeoutFailure when `pending` takes longer than the timeout. */
  private async withTimeout<T>(operation: string, pending: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutFailure(`${operation} timed out after ${this.timeoutMs} ms`)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([pending, expired]);
    } catch (err) {
      throw toTransportFailure(operation, err);
    } finally {
      clearTimeout(timer);
    }
  }

  private async post(endpoint: string, body: unknown): Promise<Response> {
    const operation = `POST ${endpoint}`;
    const token = await this.tokenProvider.getAccessToken();
    const controller = new AbortController();

    let response: Response;
    try {
      response = await this.withTimeout(
        operation,
        this.fetchFn(`${this.host}${endpoint}`, {
          method: "POST",
          headers: buildHeaders(token, this.now()),
          body: JSON.stringify(body),
          signal: controller.signal,
        }),
      );
    } catch (err) {
      controller.abort();
      throw err;
    }

    if (!response.ok) {
      const detail = formatErrorDetail(await this.withTimeout(operation, response.text()));
      log.warn("Image service rejected request", { endpoint, status: response.status });
      throw failureForStatus(response.status, detail);
    }

    return response;
  }

  /** Body chunks, each read under the timeout. Stopping early cancels the body. */
  private async *readChunks(response: Response, operation: string): AsyncGenerator<Uint8Array, void, undefined> {
    if (!response.body) return;

    const reader = response.body.getReader();
    let finished = false;

    try {
      for (;;) {
        const chunk = await this.withTimeout(operation, reader.read());
        if (chunk.done) {
          finished = true;
          return;
        }
        yield chunk.value;
      }
    } finally {
      if (!finished) {
        reader.cancel().catch((err: unknown) => {
          log.debug("Cancelling response body failed", {
            error: err instanceof Error ? err.message : String(err),
          });
        });
      }
    }
  }

  private async readBytes(response: Response): Promise<Buffer> {
    const chunks: Uint8Array[] = [];
    for await (const chunk of this.readChunks(response, "Reading the response")) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }
}
