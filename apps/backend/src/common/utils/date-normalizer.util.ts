/**
 * Utility functions for normalizing incoming date strings
 */
import {
  SolarDate,
  isValidSolarDate,
} from "../../modules/calendar/lunar";

/**
 * Normalize date to YYYYMMDD format
 * Handles various input formats:
 * - "2024-02-10" -> "20240210"
 * - "2024년 02월 10일" -> "20240210"
 * - "2024/2/10" -> "20240210"
 * - "20240210" -> "20240210"
 */
export function normalizeDate(date: string): string | null {
  if (!date) return null;

  // Separated form: year, month and day split by any non-digit run
  const parts = date.match(/^\D*(\d{4})\D+(\d{1,2})\D+(\d{1,2})\D*$/);
  if (parts) {
    const month = parts[2].padStart(2, "0");
    const day = parts[3].padStart(2, "0");
    return `${parts[1]}${month}${day}`;
  }

  // Try YYYYMMDD format (8 digits)
  const eightDigitMatch = date.trim().match(/^(\d{8})$/);
  if (eightDigitMatch) {
    return eightDigitMatch[1];
  }

  return null;
}

/**
 * Parse a date string into a calendar day.
 * Returns null for unreadable input and for impossible days such as 2023-02-29.
 */
export function parseSolarDate(date: string): SolarDate | null {
  const normalized = normalizeDate(date);
  if (!normalized) return null;

  const parsed: SolarDate = {
    year: Number(normalized.substring(0, 4)),
    month: Number(normalized.substring(4, 6)),
    day: Number(normalized.substring(6, 8)),
  };
  return isValidSolarDate(parsed) ? parsed : null;
}

