import type { ControlKey } from "@epg-link/schemas";

export const SESSION_START_COMMANDS: readonly string[] = ["ON", "START"];

const encoder = new TextEncoder();

/** UTF-8 text followed by a single NUL, as the firmware reads commands. */
export function encodeCommand(text: string): Uint8Array {
  const body = encoder.encode(text);
  const payload = new Uint8Array(body.length + 1);
  payload.set(body);
  return payload;
}

const INPUT_RESISTANCE: Record<string, string> = {
  "100K": "M:0",
  "1M": "M:1",
  "10M": "M:2",
  "100M": "M:3",
  "1G": "M:6",
  "10G": "M:4",
  SR: "M:5",
  Loopback: "M:7"
};

const EXCITATION_FREQUENCY: Record<string, string> = {
  "1000": "SDDS:1000",
  "1": "SDDS:1",
  "0": "DDSOFF"
};

function lookup(table: Record<string, string>, value: string | number): string | null {
  const key = String(value);
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : null;
}

function fixed3(value: string | number): string | null {
  const num = typeof value === "number" ? value : Number(value);
  if (typeof value === "string" && value.trim() === "") return null;
  return Number.isFinite(num) ? num.toFixed(3) : null;
}

function plain(value: string | number): string | null {
  const text = String(value).trim();
  return text.length > 0 ? text : null;
}

function prefixed(prefix: string, value: string | null): string | null {
  return value === null ? null : `${prefix}:${value}`;
}

/** Firmware command for an engineering setting, or null when nothing should be sent. */
export function commandForSetting(key: ControlKey, value: string | number): string | null {
  switch (key) {
    case "inputResistance":
      return lookup(INPUT_RESISTANCE, value);
    case "pga1":
      return prefixed("P1", plain(value));
    case "pga2":
      return prefixed("P2", plain(value));
    case "signalChainAmplification":
      return prefixed("SCA", plain(value));
    case "signalChainOffset":
      return prefixed("SCO", fixed3(value));
    case "ddsAmplification":
      return prefixed("DDSA", fixed3(value));
    case "ddsOffset":
      return prefixed("DDSO", fixed3(value));
    case "digipotChannel0":
      return prefixed("D0", plain(value));
    case "digipotChannel1":
      return prefixed("D1", plain(value));
    case "digipotChannel2":
      return prefixed("D2", plain(value));
    case "digipotChannel3":
      return prefixed("D3", plain(value));
    case "excitationFrequency":
      return lookup(EXCITATION_FREQUENCY, value);
  }
}
