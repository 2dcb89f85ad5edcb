/**
 * Compute device selection for the inference engine.
 *
 * Capability is only ever read through a DeviceProbe; resolution never
 * changes what the runtime reports as available.
 */

import { existsSync } from "node:fs";
import type { DeviceKind, RequestedDevice } from "@/types/model";

export const DEVICE_KINDS: readonly DeviceKind[] = ["cpu", "mps", "cuda"];

/** Probe order for "auto": accelerators first, cpu as the baseline. */
export const AUTO_PRIORITY: readonly DeviceKind[] = ["mps", "cuda", "cpu"];

/** Backends known to abort the process on ops the engine relies on. */
export const UNSAFE_DEVICES: ReadonlySet<DeviceKind> = new Set<DeviceKind>(["mps"]);

export const SAFE_FALLBACK_DEVICE: DeviceKind = "cpu";

export interface DeviceProbe {
  isAvailable(device: DeviceKind): boolean;
}

export const systemDeviceProbe: DeviceProbe = {
  isAvailable(device) {
    switch (device) {
      case "cpu":
        return true;
      case "mps":
        return process.platform === "darwin" && process.arch === "arm64";
      case "cuda":
        return existsSync("/proc/driver/nvidia/version");
    }
  },
};

export interface DevicePolicy {
  allowedDevices: ReadonlySet<DeviceKind>;
  /** Acknowledges the risk of running on a device listed as unsafe. */
  allowUnsafeDevices: boolean;
  unsafeDevices?: ReadonlySet<DeviceKind>;
}

export interface DeviceResolution {
  device: DeviceKind;
  /** Set when an explicit request was replaced by the safe fallback. */
  fallbackReason: string | null;
}

function rejectionReason(device: DeviceKind, policy: DevicePolicy): string | null {
  // cpu is the baseline and is always permitted.
  if (device === SAFE_FALLBACK_DEVICE) return null;
  if (!policy.allowedDevices.has(device)) {
    return `device "${device}" is not in the allowed device set`;
  }
  const unsafe = policy.unsafeDevices ?? UNSAFE_DEVICES;
  if (unsafe.has(device) && !policy.allowUnsafeDevices) {
    return `device "${device}" is marked unsafe; pass the unsafe-device override to use it`;
  }
  return null;
}

export function resolveDevice(
  requested: RequestedDevice,
  policy: DevicePolicy,
  probe: DeviceProbe = systemDeviceProbe,
): DeviceResolution {
  if (requested !== "auto") {
    const reason = rejectionReason(requested, policy);
    return reason
      ? { device: SAFE_FALLBACK_DEVICE, fallbackReason: reason }
      : { device: requested, fallbackReason: null };
  }

  for (const device of AUTO_PRIORITY) {
    if (rejectionReason(device, policy) === null && probe.isAvailable(device)) {
      return { device, fallbackReason: null };
    }
  }
  return { device: SAFE_FALLBACK_DEVICE, fallbackReason: null };
}

export function parseDeviceList(value: string): DeviceKind[] {
  const devices: DeviceKind[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    const match = DEVICE_KINDS.find((d) => d === name);
    if (!match) {
      throw new RangeError(`Unknown device "${raw.trim()}" (expected one of ${DEVICE_KINDS.join(", ")})`);
    }
    if (!devices.includes(match)) devices.push(match);
  }
  return devices;
}
