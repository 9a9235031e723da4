import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { Vec3 } from "@/math/Vec3";
import { Quaternion } from "@/quaternion/Quaternion";
import { pow } from "@/quaternion/algebra";
import { fromEulerAnglesXYZ, lookAt } from "@/quaternion/construction";
import { toEulerAnglesXYZ } from "@/quaternion/conversions";
import { log } from "@/quaternion/geodesic";
import { slerp } from "@/quaternion/interpolation";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("RotationDebugLogger", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    RotationDebugLogger.clear();
  });

  afterEach(() => {
    RotationDebugLogger.disable();
    RotationDebugLogger.clear();
    vi.restoreAllMocks();
  });

  it("should be disabled by default and record nothing", () => {
    expect(RotationDebugLogger.isEnabled()).toBe(false);
    void new Quaternion(0, 0, 0, 0).unit;
    expect(RotationDebugLogger.getAllLogs()).toHaveLength(0);
    expect(RotationDebugLogger.getLastLog()).toBeNull();
  });

  it("should announce enable and disable", () => {
    RotationDebugLogger.enable();
    expect(console.log).toHaveBeenLastCalledWith(
      "[ROTATION DEBUG] Logging enabled. Use RotationDebugLogger.dump() to see logs."
    );
    RotationDebugLogger.disable();
    expect(console.log).toHaveBeenLastCalledWith("[ROTATION DEBUG] Logging disabled.");
  });

  it("should toggle", () => {
    RotationDebugLogger.toggle();
    expect(RotationDebugLogger.isEnabled()).toBe(true);
    RotationDebugLogger.toggle();
    expect(RotationDebugLogger.isEnabled()).toBe(false);
  });

  it("should record normalizing the zero quaternion", () => {
    RotationDebugLogger.enable();
    const unit = new Quaternion(0, 0, 0, 0).unit;

    expect(unit).toBe(Quaternion.identity);
    const entry = RotationDebugLogger.getLastLog();
    expect(entry?.kind).toBe("normalize_zero");
    expect(entry?.operation).toBe("normalize");
    expect(entry?.input).toEqual([0, 0, 0, 0]);
    expect(console.log).toHaveBeenLastCalledWith(
      "[ROTATION DEBUG] normalize: normalize_zero (0, 0, 0, 0)"
    );
  });

  it("should include the detail in the console line", () => {
    RotationDebugLogger.enable();
    pow(new Quaternion(0, 0, 0, 4), 0.5);
    expect(RotationDebugLogger.getLastLog()?.detail).toBe("n=0.5");
    expect(console.log).toHaveBeenLastCalledWith(
      "[ROTATION DEBUG] pow: pow_real_only (0, 0, 0, 4) - n=0.5"
    );
  });

  it("should record each kind of fallback", () => {
    RotationDebugLogger.enable();
    log(Quaternion.zero);
    slerp(Quaternion.identity, Quaternion.identity, 0.5);
    toEulerAnglesXYZ(fromEulerAnglesXYZ(0.3, Math.PI / 2, 0));
    lookAt(Vec3.zero(), Vec3.create(0, 1, 0));

    expect(RotationDebugLogger.getAllLogs().map((entry) => entry.kind)).toEqual([
      "log_zero",
      "slerp_linear",
      "gimbal_lock",
      "basis_fallback",
    ]);
  });

  it("should not change returned values", () => {
    const disabled = log(Quaternion.zero).components();
    RotationDebugLogger.enable();
    expect(log(Quaternion.zero).components()).toEqual(disabled);
  });

  it("should keep only the last 100 entries", () => {
    RotationDebugLogger.enable();
    for (let i = 0; i < 105; i++) {
      RotationDebugLogger.logFallback("normalize_zero", "normalize", [i]);
    }
    const logs = RotationDebugLogger.getAllLogs();
    expect(logs).toHaveLength(100);
    expect(logs[0]?.input).toEqual([5]);
    expect(logs[99]?.input).toEqual([104]);
  });

  it("should dump one group per entry", () => {
    const group = vi.spyOn(console, "group").mockImplementation(() => {});
    const groupEnd = vi.spyOn(console, "groupEnd").mockImplementation(() => {});
    RotationDebugLogger.enable();
    RotationDebugLogger.logFallback("log_zero", "log", [0, 0, 0, 0]);
    RotationDebugLogger.logFallback("slerp_linear", "slerp", [0, 0, 0, 1]);

    RotationDebugLogger.dump();

    expect(group).toHaveBeenCalledTimes(2);
    expect(groupEnd).toHaveBeenCalledTimes(2);
    expect(console.log).toHaveBeenCalledWith("Total logs:", 2);
    expect(console.log).toHaveBeenCalledWith("Operation:", "slerp");
  });

  describe("exportAsTestSetup", () => {
    it("should say when there is nothing to export", () => {
      expect(RotationDebugLogger.exportAsTestSetup()).toBe("// No log available");
    });

    it("should rebuild the input quaternion", () => {
      RotationDebugLogger.enable();
      RotationDebugLogger.logFallback("log_zero", "log", [0, 0, 0, 0]);
      const lines = RotationDebugLogger.exportAsTestSetup().split("\n");
      expect(lines[1]).toBe('it("reproduces log_zero in log", () => {');
      expect(lines[2]).toBe("  const q = new Quaternion(0, 0, 0, 0);");
    });
  });
});
