import type { InputIssue } from "./menu/feedback.js";

export const THRESHOLD_MIN_C = -50;
export const THRESHOLD_MAX_C = 100;

const FORBIDDEN_CHARS = ["<", ">", "&", '"', "'", ";", "|", "`", "$"];
const INJECTION_WORDS = /\b(union|select|drop|insert|update|delete|exec|script)\b/i;
const SHELL_COMMANDS = ["rm ", "sudo ", "chmod ", "wget ", "curl "];
const NAME_WORD = /^[А-Яа-яЁёA-Za-z'-]+$/;
// `thr:set:<group>:<device>` has to fit the 64-byte callback_data limit.
export const MAX_KEY_LENGTH = 27;
const KEY_PATTERN = new RegExp(`^[A-Za-z0-9 _-]{1,${MAX_KEY_LENGTH}}$`);
const NUMBER_PATTERN = /^[-+]?(\d+([.,]\d*)?|[.,]\d+)$/;

/** Returns the problem with a raw inbound text, or `null` when it can be processed. */
export const checkInput = (text: string, maxLength: number): InputIssue | null => {
  if (text.length > maxLength) return "too_long";
  if (!text.trim()) return "free_text";
  if (FORBIDDEN_CHARS.some((char) => text.includes(char))) return "invalid_chars";
  const lower = text.toLowerCase();
  if (INJECTION_WORDS.test(lower)) return "invalid_chars";
  if (SHELL_COMMANDS.some((command) => lower.includes(command))) return "invalid_chars";
  return null;
};

const startsUpper = (word: string): boolean => {
  const first = word.charAt(0);
  return first === first.toUpperCase() && first !== first.toLowerCase();
};

/** Full name: 3 to 5 capitalised words of 2 to 15 letters. */
export const isValidName = (text: string): boolean => {
  const name = text.trim();
  if (name.length < 5 || name.length > 100) return false;
  const words = name.split(/\s+/);
  if (words.length < 3 || words.length > 5) return false;
  return words.every(
    (word) => word.length >= 2 && word.length <= 15 && NAME_WORD.test(word) && startsUpper(word),
  );
};

export const isValidPosition = (text: string): boolean => {
  const position = text.trim();
  return position.length >= 2 && position.length <= 100;
};

export const isValidKey = (value: string): boolean => KEY_PATTERN.test(value);

export type ThresholdPair = { min: number; max: number };

export type PairParseResult = { ok: true; pair: ThresholdPair } | { ok: false; issue: InputIssue };

/** Parses "min max" (comma decimals allowed) into a band within the supported range. */
export const parseThresholdPair = (text: string): PairParseResult => {
  const parts = text.trim().split(/\s+/).filter(Boolean);
  if (parts.length !== 2) return { ok: false, issue: "wrong_format" };
  if (!parts.every((part) => NUMBER_PATTERN.test(part))) return { ok: false, issue: "not_numbers" };

  const [min, max] = parts.map((part) => Number(part.replace(",", ".")));
  if (min >= max) return { ok: false, issue: "min_not_below_max" };
  if (min < THRESHOLD_MIN_C || max > THRESHOLD_MAX_C) return { ok: false, issue: "out_of_range" };
  return { ok: true, pair: { min, max } };
};
