import { createHash } from "node:crypto";

/**
 * Sleep for the specified number of milliseconds
 *
 * If a signal is given, aborting it clears the timer and rejects with the
 * signal's reason.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);

      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Compute the SHA-256 digest of some content, as a hex string
 */
export function sha256(content: string | Buffer) {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Interpolate a string with variables from a Map.
 *
 * This function interpolates a string with variables following the Bash-like
 * syntax, in a single pass:
 *
 * - Default value substitution: `${VARIABLE_NAME:-default}` or
 *   `${VARIABLE_NAME-default}`
 *   If the variable is missing, it returns the default value.
 * - Alternative value substitution: `${VARIABLE_NAME:+default}` or
 *   `${VARIABLE_NAME+default}`
 *   If the variable is present, it returns the default value.
 * - Required value substitution: `${VARIABLE_NAME:?message}` or
 *   `${VARIABLE_NAME?message}`
 *   If the variable is missing, it throws an error with the message.
 * - If the variable is present, it returns the variable's value.
 *
 * Only the braced `${VARIABLE_NAME}` form is recognised, and references to
 * variables missing from the map without an operator are left untouched, so
 * that templates may carry references meant for another engine, such as
 * `${AWS::Region}` or `${LogicalId}`. A doubled dollar sign (`$${NAME}`)
 * escapes a reference and is collapsed into a single one.
 *
 * @param str The string to interpolate
 * @param variables A Map of variable names to their values
 */
export function interpolateString(
  str: string,
  variables: Map<string, string>,
): string {
  type Operator = ":-" | ":+" | ":?" | "?" | "-" | "+";

  function resolveMatch(
    value: string | undefined,
    operator: Operator | undefined,
    defaultValue: string | undefined,
  ): string | undefined {
    if (
      (operator === "-" && value === undefined) ||
      (operator === ":-" && !value) ||
      (operator === "+" && value !== undefined) ||
      (operator === ":+" && value)
    ) {
      return defaultValue ?? "";
    }

    if (operator === "+" || operator === ":+") {
      return "";
    }

    if (
      (operator === "?" && value === undefined) ||
      (operator === ":?" && !value)
    ) {
      throw new Error(`Missing required value: ${defaultValue}`);
    }

    return value;
  }

  return str.replace(
    /\$(\$?)\{([a-zA-Z_][a-zA-Z0-9_]*)(?:(:?[-+?])([^{}]*))?}/g,
    (
      fullMatch: string,
      escape: string,
      key: string,
      operator: Operator | undefined,
      defaultValue: string | undefined,
    ) => {
      if (escape) {
        return fullMatch.slice(1);
      }

      let replacement: string | undefined;

      try {
        replacement = resolveMatch(variables.get(key), operator, defaultValue);
      } catch (cause) {
        const message = cause instanceof Error ? cause.message : String(cause);

        throw new Error(`Failed to resolve variable ${key}: ${message}`, {
          cause,
        });
      }

      return replacement ?? fullMatch;
    },
  );
}
