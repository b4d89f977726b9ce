import { Readable } from 'stream';
import { type Logger, field } from '../common/logger';
import { MultipartWriter, encodeFormFields } from '../common/multipart';
import { withSpan } from '../telemetry/tracing';
import {
  ACCEPT_IMAGE,
  ACCEPT_JSON,
  EFFECT_BOUNDARY,
  UPLOAD_BOUNDARY,
  UPLOAD_FIELD,
  UPLOAD_FILENAME,
  endpoints,
} from './constants';
import type { EffectRequest } from './effects';
import {
  EffectRequestError,
  EmptyKeyError,
  ImageDownloadError,
  ResultFetchError,
  type StepFailure,
  UploadError,
  transportFailure,
} from './errors';
import { type HttpResult, type OutboundRequest, statusLine } from './http';
import { extractImageUrl } from './scrape';
import type { Transport } from './transport';
import { parseUploadResponse } from './uploadResponse';

export type ImageSource = Readable | Uint8Array;

export interface PipelineOptions {
  signal?: AbortSignal;
}

/**
 * Reads an image source into memory. Streams are destroyed as soon as reading
 * ends, whether it succeeded or not.
 */
export async function readImage(source: ImageSource): Promise<Buffer> {
  if (source instanceof Uint8Array) return Buffer.from(source);

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of source) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } finally {
    source.destroy();
  }
  return Buffer.concat(chunks);
}

/**
 * The upload → effect → result page → download sequence. Each step needs the
 * previous one's output, so they run strictly one after another.
 */
export class EffectPipeline {
  constructor(
    private transport: Transport,
    private baseUrl: string,
    private logger: Logger
  ) {}

  async run(source: ImageSource, effect: EffectRequest, opts: PipelineOptions = {}): Promise<Buffer> {
    const imageKey = await this.upload(source, effect, opts);
    const resultUrl = await this.invokeEffect(imageKey, effect, opts);
    const imageUrl = await this.fetchResultPage(resultUrl, opts);
    return this.download(imageUrl, resultUrl, opts);
  }

  async upload(source: ImageSource, effect: EffectRequest, opts: PipelineOptions = {}): Promise<string> {
    const { signal } = opts;

    let imageData: Buffer;
    try {
      imageData = await readImage(source);
    } catch (err) {
      throw new UploadError('failed to read image data', { reason: 'read', cause: err });
    }
    this.logger.info('read image data', field('size', imageData.length));

    return withSpan(
      'photofunia.upload',
      async (span) => {
        const writer = new MultipartWriter(UPLOAD_BOUNDARY);
        writer.writeFile(UPLOAD_FIELD, UPLOAD_FILENAME, imageData);
        const body = writer.finish();

        const req = await this.transport.buildRequest('POST', endpoints.upload(this.baseUrl), body, signal);
        req.headers.set('Accept', ACCEPT_JSON);
        req.headers.set('Content-Type', writer.contentType);
        req.headers.set('Referer', endpoints.effectPage(this.baseUrl, effect.path));

        this.logger.info('sending image upload');
        const res = await this.sendStep(req, signal, (failure) => new UploadError('failed to upload image', failure));
        if (res.status !== 200) {
          throw new UploadError(`server returned non-OK status for upload: ${statusLine(res)}`, {
            reason: 'status',
            status: res.status,
          });
        }

        this.logger.info(
          'received upload response',
          field('contentType', res.headers.get('content-type')),
          field('contentLength', res.body.length)
        );

        let key: string;
        try {
          key = parseUploadResponse(res.body.toString('utf8')).response.key;
        } catch (err) {
          throw new UploadError('failed to decode upload response', { reason: 'decode', cause: err });
        }
        if (key === '') throw new EmptyKeyError();

        span.setAttribute('photofunia.image_key', key);
        this.logger.info('got image key', field('key', key));
        return key;
      },
      { 'photofunia.image_bytes': imageData.length }
    );
  }

  /** Submits the effect form and returns the result page URL the service redirected to. */
  async invokeEffect(imageKey: string, effect: EffectRequest, opts: PipelineOptions = {}): Promise<string> {
    const { signal } = opts;

    return withSpan(
      'photofunia.effect',
      async (span) => {
        const params: Record<string, string> = { ...effect.params, image: imageKey };
        const body = encodeFormFields(EFFECT_BOUNDARY, params);

        const req = await this.transport.buildRequest('POST', endpoints.effect(this.baseUrl, effect.path), body, signal);
        req.headers.set('Content-Type', `multipart/form-data; boundary=${EFFECT_BOUNDARY}`);
        req.headers.set('Referer', endpoints.effectPage(this.baseUrl, effect.path));

        this.logger.info('sending effect request', field('effect', effect.path));
        const res = await this.sendStep(
          req,
          signal,
          (failure) => new EffectRequestError(`failed to perform request to effect ${effect.path}`, failure)
        );
        if (res.status !== 200) {
          throw new EffectRequestError(`server returned non-OK status for effect ${effect.path}: ${statusLine(res)}`, {
            reason: 'status',
            status: res.status,
          });
        }

        this.logger.info(
          'received effect response',
          field('contentType', res.headers.get('content-type')),
          field('contentLength', res.body.length),
          field('resultURL', res.url)
        );
        span.setAttribute('photofunia.result_url', res.url);
        return res.url;
      },
      { 'photofunia.effect': effect.path }
    );
  }

  /** Loads the result page and scrapes the processed image URL from it. */
  async fetchResultPage(resultUrl: string, opts: PipelineOptions = {}): Promise<string> {
    const { signal } = opts;

    return withSpan('photofunia.result', async () => {
      const req = await this.transport.buildRequest('GET', resultUrl, undefined, signal);
      const res = await this.sendStep(req, signal, (failure) => new ResultFetchError('failed to get result page', failure));
      if (res.status !== 200) {
        throw new ResultFetchError(`server returned non-OK status for result page: ${statusLine(res)}`, {
          reason: 'status',
          status: res.status,
        });
      }

      const imageUrl = extractImageUrl(res.body.toString('utf8'));
      this.logger.info('found image URL', field('url', imageUrl));
      return imageUrl;
    });
  }

  async download(imageUrl: string, resultUrl: string, opts: PipelineOptions = {}): Promise<Buffer> {
    const { signal } = opts;

    return withSpan('photofunia.download', async (span) => {
      const req = await this.transport.buildRequest('GET', imageUrl, undefined, signal);
      req.headers.set('Accept', ACCEPT_IMAGE);
      req.headers.set('Referer', resultUrl);

      const res = await this.sendStep(req, signal, (failure) => new ImageDownloadError('failed to download image', failure));
      if (res.status !== 200) {
        throw new ImageDownloadError(`server returned non-OK status for image: ${statusLine(res)}`, {
          reason: 'status',
          status: res.status,
        });
      }

      span.setAttribute('photofunia.result_bytes', res.body.length);
      this.logger.info('successfully downloaded image', field('url', imageUrl), field('size', res.body.length));
      return res.body;
    });
  }

  private async sendStep(
    req: OutboundRequest,
    signal: AbortSignal | undefined,
    wrap: (failure: StepFailure) => Error
  ): Promise<HttpResult> {
    try {
      return await this.transport.send(req, signal);
    } catch (err) {
      throw wrap(transportFailure(err));
    }
  }
}
