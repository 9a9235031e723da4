/**
 * RotationDebugLogger - Captures degenerate-case fallbacks for debugging
 *
 * Every numerical degeneracy in the library (zero-length normalization,
 * coincident slerp endpoints, gimbal lock, ...) returns a documented fallback
 * value instead of failing. Enable this to see which fallbacks fired and with
 * which inputs. The output can be copied and used to create test setups.
 *
 * Disabled by default. Logging never changes a returned value.
 */

/**
 * Degenerate branches that can be recorded.
 */
export type FallbackKind =
  | "normalize_zero" // Zero quaternion normalized to identity
  | "pow_real_only" // Imaginary part negligible, real-only power returned
  | "log_zero" // Logarithm of the zero quaternion
  | "slerp_linear" // Coincident endpoints, linear interpolation used
  | "axis_small_angle" // Near-zero half-angle sine, raw axis returned
  | "gimbal_lock" // Euler extraction hit its singularity branch
  | "basis_fallback"; // Parallel basis vectors replaced by a fixed axis

/**
 * Debug log entry for a single fallback.
 */
export interface RotationDebugLog {
  timestamp: number;
  kind: FallbackKind;
  operation: string;
  /** Input components in x, y, z, w order */
  input: readonly number[];
  detail?: string;
}

class RotationDebugLoggerImpl {
  private enabled = false;
  private logs: RotationDebugLog[] = [];
  private maxLogs = 100;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[ROTATION DEBUG] Logging enabled. Use RotationDebugLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[ROTATION DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a fallback. No-op while disabled.
   */
  logFallback(
    kind: FallbackKind,
    operation: string,
    input: readonly number[],
    detail?: string
  ): void {
    if (!this.enabled) return;

    const log: RotationDebugLog = {
      timestamp: Date.now(),
      kind,
      operation,
      input: [...input],
      detail,
    };
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    console.log(
      `[ROTATION DEBUG] ${operation}: ${kind} (${input.join(", ")})${detail ? ` - ${detail}` : ""}`
    );
  }

  getLastLog(): RotationDebugLog | null {
    return this.logs[this.logs.length - 1] ?? null;
  }

  getAllLogs(): readonly RotationDebugLog[] {
    return this.logs;
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
  }

  /**
   * Dump all logs to console, grouped by fallback kind.
   */
  dump(): void {
    console.log("[ROTATION DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);
    for (const log of this.logs) {
      console.group(`${log.kind} @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Operation:", log.operation);
      console.log("Input:", log.input);
      if (log.detail) {
        console.log("Detail:", log.detail);
      }
      console.groupEnd();
    }
  }

  /**
   * Export the last log as a test case reproducing the fallback.
   */
  exportAsTestSetup(): string {
    const log = this.getLastLog();
    if (!log) {
      return "// No log available";
    }

    return `// ${log.kind} captured ${new Date(log.timestamp).toISOString()}
it("reproduces ${log.kind} in ${log.operation}", () => {
  const q = new Quaternion(${log.input.join(", ")});
  // Call ${log.operation} and assert the fallback value
});`;
  }
}

/**
 * Global debug logger instance.
 */
export const RotationDebugLogger = new RotationDebugLoggerImpl();
