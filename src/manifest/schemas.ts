/**
 * Zod schemas describing the raw Compose shapes the normalizer accepts.
 *
 * Fields are `nullish` because an empty YAML key (`environment:`) loads as
 * null. Unknown keys pass through untouched; the linter only reads the keys
 * listed here.
 */

import { z } from 'zod';

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const rawEnvironmentSchema = z.union([
  z.array(scalarSchema),
  z.record(z.union([scalarSchema, z.null()])),
]);

export const rawVolumeSchema = z.union([
  z.string(),
  z
    .object({
      type: z.string().optional(),
      source: z.string().nullish(),
      target: z.string(),
      read_only: z.boolean().nullish(),
    })
    .passthrough(),
]);

export const rawPortSchema = z.union([
  z.number().int(),
  z.string(),
  z
    .object({
      target: z.union([z.number().int(), z.string()]),
      published: z.union([z.number().int(), z.string()]).nullish(),
      host_ip: z.string().nullish(),
      protocol: z.string().nullish(),
      mode: z.string().nullish(),
    })
    .passthrough(),
]);

/**
 * `depends_on` and service `networks` share the list-or-mapping shape
 */
export const rawNameCollectionSchema = z.union([z.array(z.string()), z.record(z.unknown())]);

export const rawHealthcheckSchema = z
  .object({
    test: z.union([z.string(), z.array(z.string())]).nullish(),
    disable: z.boolean().nullish(),
  })
  .passthrough();

export const rawServiceSchema = z
  .object({
    image: z.string().nullish(),
    // A string may be a `${VAR}` substitution; only `true` and 'true' grant privilege
    privileged: z.union([z.boolean(), z.string()]).nullish(),
    cap_add: z.array(z.string()).nullish(),
    command: z.union([z.string(), z.array(scalarSchema)]).nullish(),
    network_mode: z.string().nullish(),
    volumes: z.array(rawVolumeSchema).nullish(),
    environment: rawEnvironmentSchema.nullish(),
    user: z.union([z.string(), z.number()]).nullish(),
    security_opt: z.array(z.string()).nullish(),
    ports: z.array(rawPortSchema).nullish(),
    restart: z.union([z.string(), z.boolean()]).nullish(),
    networks: rawNameCollectionSchema.nullish(),
    depends_on: rawNameCollectionSchema.nullish(),
    healthcheck: rawHealthcheckSchema.nullish(),
  })
  .passthrough();

export const rawNetworkSchema = z
  .object({
    external: z.union([z.boolean(), z.record(z.unknown())]).nullish(),
    driver: z.string().nullish(),
  })
  .passthrough();

export const rawManifestSchema = z
  .object({
    services: z.record(z.union([rawServiceSchema, z.null()])).nullish(),
    networks: z.record(z.union([rawNetworkSchema, z.null()])).nullish(),
    volumes: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type RawService = z.infer<typeof rawServiceSchema>;
export type RawVolume = z.infer<typeof rawVolumeSchema>;
export type RawPort = z.infer<typeof rawPortSchema>;
export type RawEnvironment = z.infer<typeof rawEnvironmentSchema>;
export type RawNetwork = z.infer<typeof rawNetworkSchema>;
