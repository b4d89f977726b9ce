import { type Logger, NoopLogger } from '../common/logger';
import { defaults, normalizeBaseUrl } from '../config';
import { type ClownOptions, type EffectRequest, clown, fatMaker } from './effects';
import type { FetchLike } from './http';
import { EffectPipeline, type ImageSource, type PipelineOptions } from './pipeline';
import { SessionManager } from './session';
import { Transport } from './transport';

export interface PhotoFuniaClientOptions {
  logger?: Logger;
  /** Per-request timeout in milliseconds; 0 disables it */
  timeout?: number;
  baseUrl?: string;
  /** Reuse a PHPSESSID obtained earlier instead of bootstrapping one */
  sessionId?: string;
  fetch?: FetchLike;
}

export interface ClownifyOptions extends PipelineOptions, ClownOptions {}

/**
 * Client for the PhotoFunia effects service.
 *
 * A client holds one session and is meant to be used by one task at a time.
 * Run concurrent work on separate instances.
 *
 * @example
 * const client = new PhotoFuniaClient();
 * const out = await client.clownify(fs.createReadStream('me.jpg'), { includeHat: true });
 */
export class PhotoFuniaClient {
  readonly logger: Logger;
  readonly timeout: number;
  readonly baseUrl: string;

  private fetchImpl: FetchLike;
  private session: SessionManager;
  private pipeline: EffectPipeline;

  constructor(options: PhotoFuniaClientOptions = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.timeout = options.timeout ?? defaults.timeout;
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? defaults.baseUrl);
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));

    const shared = {
      baseUrl: this.baseUrl,
      timeoutMs: this.timeout,
      fetch: this.fetchImpl,
      logger: this.logger,
    };
    this.session = new SessionManager({ ...shared, sessionId: options.sessionId });
    const transport = new Transport(this.session, shared);
    this.pipeline = new EffectPipeline(transport, this.baseUrl, this.logger);
  }

  /** The PHPSESSID in use, once one has been acquired. */
  get sessionId(): string | undefined {
    return this.session.current;
  }

  /**
   * A copy of this client with a different per-request timeout. The copy starts
   * from the current session token but keeps its own afterwards.
   */
  withTimeout(timeout: number): PhotoFuniaClient {
    return new PhotoFuniaClient({
      logger: this.logger,
      timeout,
      baseUrl: this.baseUrl,
      sessionId: this.session.current,
      fetch: this.fetchImpl,
    });
  }

  ensureSession(signal?: AbortSignal): Promise<string> {
    return this.session.ensureSession(signal);
  }

  /** Applies the "fat maker" face effect. */
  fatify(image: ImageSource, options: PipelineOptions = {}): Promise<Buffer> {
    return this.applyEffect(image, fatMaker(), options);
  }

  /** Applies the clown effect, optionally with a clown hat. */
  clownify(image: ImageSource, options: ClownifyOptions = {}): Promise<Buffer> {
    return this.applyEffect(image, clown({ includeHat: options.includeHat }), { signal: options.signal });
  }

  /**
   * Runs any effect route with caller-supplied form fields. The `image` field
   * is filled in with the uploaded image key.
   */
  applyEffect(image: ImageSource, effect: EffectRequest, options: PipelineOptions = {}): Promise<Buffer> {
    return this.pipeline.run(image, effect, options);
  }
}
