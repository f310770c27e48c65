/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for TwitchTuner.
 */

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Splits a whitespace-separated argument string from configuration into an argument vector. Double-quoted runs are kept together so that a single argument can contain
 * spaces (e.g., a filter graph).
 * @param value - The configured argument string.
 * @returns The argument vector. Empty input yields an empty array.
 */
export function splitArgs(value: string): string[] {

  const args: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match: RegExpExecArray | null;

  while((match = pattern.exec(value)) !== null) {

    args.push(match[1] ?? match[2]);
  }

  return args;
}

/**
 * Escapes text for inclusion in XML element content or attribute values.
 * @param value - The raw text.
 * @returns The escaped text.
 */
export function escapeXml(value: string): string {

  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;").replace(/'/g, "&apos;");
}
