import { z } from "zod";
import { formatZodError } from "../config/config.utils.js";
import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import type { CreateRemoteResourceManagerOptions } from "../types/index.js";

/**
 * Zod schema for the serializable part of the manager options.
 * Uses strict mode so misspelled keys are reported instead of ignored.
 */
export const managerConfigSchema = z
  .object({
    graphql: z
      .object({
        endpoint: z.string().url(),
        token: z.string().min(1, "graphql.token must be a non-empty string"),
      })
      .strict(),
    queries: z.record(z.string().min(1), z.string().min(1)).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Validates `createRemoteResourceManager` options.
 * Throws a descriptive error when they are invalid.
 */
export class ManagerOptionsValidator {
  public static validate(options: CreateRemoteResourceManagerOptions): void {
    const { transport, logger, ...config } = options;
    const parsed = managerConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new RemoteResourceError(
        `Invalid remote resource manager options:\n${formatZodError(parsed.error)}`,
        "E_VALIDATION"
      );
    }

    if (transport !== undefined && typeof transport !== "function") {
      throw new RemoteResourceError(
        "transport must be a function: (request, signal) => Promise<RawResponse>",
        "E_VALIDATION"
      );
    }

    if (transport !== undefined && options.timeoutMs !== undefined) {
      if (typeof process.emitWarning === "function") {
        process.emitWarning(
          "Both `transport` and `timeoutMs` were provided. `timeoutMs` only applies to the default transport.",
          { code: "REMOTE_RESOURCES_TIMEOUT_IGNORED" }
        );
      }
    }

    if (
      logger !== undefined &&
      logger !== false &&
      (typeof logger !== "object" ||
        typeof logger.warn !== "function" ||
        typeof logger.info !== "function" ||
        typeof logger.debug !== "function" ||
        typeof logger.error !== "function")
    ) {
      throw new RemoteResourceError(
        "logger must be false or an object with debug, info, warn and error functions",
        "E_VALIDATION"
      );
    }
  }
}
