export { PhotoFuniaClient } from './client/photoFuniaClient';
export type { PhotoFuniaClientOptions, ClownifyOptions } from './client/photoFuniaClient';
export { EffectPipeline, readImage } from './client/pipeline';
export type { ImageSource, PipelineOptions } from './client/pipeline';
export { SessionManager, findCookie } from './client/session';
export { Transport } from './client/transport';
export { extractImageUrl } from './client/scrape';
export { fatMaker, clown, onOff, FULL_CROP, EFFECT_NAMES, isEffectName } from './client/effects';
export type { EffectRequest, EffectName, ClownOptions } from './client/effects';
export type { FetchLike, HttpMethod, HttpResult, OutboundRequest } from './client/http';
export type { UploadResponse } from './client/uploadResponse';
export * from './client/errors';
export * from './client/constants';
export { NoopLogger, NdjsonLogger, field } from './common/logger';
export type { Logger, LogField } from './common/logger';
export { loadConfigFromEnv } from './config';
export type { EnvConfig } from './config';
