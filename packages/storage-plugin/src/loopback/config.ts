import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { InvalidArgumentError } from '@objstream/transport';

/**
 * The schema of a loopback plugin configuration, as written in a JSON file
 * or passed to the constructor.
 */
export const loopbackConfigSchema = z
  .object({
    /** Bytes per download response. */
    chunkSize: z.number().int().positive(),
    /** Buckets that exist before the first upload. */
    buckets: z.array(z.string().min(1)),
    /** Create a missing bucket on upload instead of rejecting the object. */
    autoCreateBuckets: z.boolean(),
  })
  .strict();

export type LoopbackConfig = z.infer<typeof loopbackConfigSchema>;

export const DEFAULT_LOOPBACK_CONFIG: Readonly<LoopbackConfig> = {
  chunkSize: 64 * 1024,
  buckets: [],
  autoCreateBuckets: true,
};

/**
 * Validates a partial configuration and fills in the defaults.
 * @throws InvalidArgumentError listing every invalid field.
 */
export function resolveLoopbackConfig(input: unknown = {}): LoopbackConfig {
  const result = loopbackConfigSchema.partial().safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid loopback config: ${issues}`, result.error);
  }

  const config = result.data;
  return {
    chunkSize: config.chunkSize ?? DEFAULT_LOOPBACK_CONFIG.chunkSize,
    buckets: [...(config.buckets ?? DEFAULT_LOOPBACK_CONFIG.buckets)],
    autoCreateBuckets:
      config.autoCreateBuckets ?? DEFAULT_LOOPBACK_CONFIG.autoCreateBuckets,
  };
}

/**
 * Loads a loopback configuration from a JSON file.
 * @throws An error if the file cannot be read or parsed, or an
 * InvalidArgumentError if its contents are invalid.
 */
export async function loadLoopbackConfig(configPath: string): Promise<LoopbackConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Failed to load loopback config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Failed to parse loopback config from ${configPath}: Invalid JSON format. ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return resolveLoopbackConfig(parsed);
}
