import { z } from 'zod';

const ImageVariantSchema = z.object({
  url: z.string(),
  width: z.number(),
  height: z.number(),
});

// Only `response.key` is read by the pipeline. The rest is modelled so that
// well-formed payloads decode, null or absent alike, and unknown fields are
// stripped.
export const UploadResponseSchema = z.object({
  response: z.object({
    key: z.string(),
    server: z.number().nullish(),
    existed: z.boolean().nullish(),
    expiry: z.number().nullish(),
    created: z.number().nullish(),
    lifetime: z.number().nullish(),
    image: z
      .object({
        highres: ImageVariantSchema.nullish(),
        preview: ImageVariantSchema.nullish(),
        thumb: ImageVariantSchema.nullish(),
      })
      .nullish(),
    sid: z.string().nullish(),
  }),
});

export type UploadResponse = z.infer<typeof UploadResponseSchema>;

/**
 * Decodes an upload reply. Throws on malformed JSON or a payload without a
 * string `response.key`.
 */
export function parseUploadResponse(body: string): UploadResponse {
  const json: unknown = JSON.parse(body);
  return UploadResponseSchema.parse(json);
}
