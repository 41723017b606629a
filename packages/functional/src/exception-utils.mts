/**
 * @module exception-utils
 * @description Re-raise low-level failures as a caller-chosen error.
 *
 * @example
 * ```typescript
 * class ConfigLoadError extends Error {}
 *
 * const config = transformExceptions(
 *   () => JSON.parse(readFileSync(path, 'utf8')) as AppConfig,
 *   (cause) => new ConfigLoadError(`cannot load ${path}`, { cause }),
 * );
 * ```
 *
 * @category Error Handling
 * @since 2025-07-03
 */

/**
 * Maps whatever a supplier threw into the error to raise instead.
 */
export type ErrorTransformer<E> = (error: unknown) => E;

/**
 * Returns the result of `supplier`. If it throws, the thrown value is passed to `transformer`
 * and the transformer's result is thrown instead.
 *
 * @category Error Handling
 */
export const transformExceptions = <T, E>(supplier: () => T, transformer: ErrorTransformer<E>): T => {
  try {
    return supplier();
  } catch (error) {
    throw transformer(error);
  }
};

/**
 * Async counterpart of {@link transformExceptions}: the returned promise rejects with the
 * transformed error when `supplier` rejects or throws.
 *
 * @category Error Handling
 * @example
 * await transformExceptionsAsync(
 *   () => fs.promises.appendFile(logFile, line),
 *   (cause) => new AuditWriteError(logFile, { cause }),
 * );
 */
export const transformExceptionsAsync = async <T, E>(
  supplier: () => Promise<T>,
  transformer: ErrorTransformer<E>,
): Promise<T> => {
  try {
    return await supplier();
  } catch (error) {
    throw transformer(error);
  }
};
