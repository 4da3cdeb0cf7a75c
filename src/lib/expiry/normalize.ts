import type {
  DroppedCandidate,
  EvaluationInput,
  ExpirationType,
  RawExpiration
} from "@/src/lib/types";

const MS_PER_DAY = 1000 * 60 * 60 * 24;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const QUARTER_END_MONTHS = new Set([2, 5, 8, 11]);
const FRIDAY = 5;

const EXPIRATION_TYPE_ALIASES: Record<string, ExpirationType> = {
  weekly: "weekly",
  monthly: "monthly",
  quarterly: "quarterly",
  eow: "eow",
  "end-of-week": "eow",
  end_of_week: "eow",
  eom: "eom",
  "end-of-month": "eom",
  end_of_month: "eom",
  eoq: "eoq",
  "end-of-quarter": "eoq",
  end_of_quarter: "eoq",
  other: "other"
};

export type NormalizedCandidate = EvaluationInput & {
  date: string;
};

export type NormalizedBatch = {
  candidates: NormalizedCandidate[];
  dropped: DroppedCandidate[];
};

/**
 * Strict `YYYY-MM-DD` parse to UTC midnight. Rejects rollovers such as `2026-02-30`
 * that `Date` would otherwise accept.
 */
export const parseIsoDate = (value: string): Date | null => {
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return null;
  }
  return parsed;
};

export const formatDate = (value: Date) => value.toISOString().slice(0, 10);

export const startOfUtcDay = (value: Date) =>
  new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));

export const diffInDays = (from: Date, to: Date) =>
  Math.round((startOfUtcDay(to).getTime() - startOfUtcDay(from).getTime()) / MS_PER_DAY);

export const addDays = (from: Date, days: number) =>
  new Date(startOfUtcDay(from).getTime() + days * MS_PER_DAY);

const isThirdFriday = (date: Date) => {
  const day = date.getUTCDate();
  return date.getUTCDay() === FRIDAY && day >= 15 && day <= 21;
};

// Heuristic only: real listings should pass their exchange-provided type through.
export const classifyExpiration = (date: Date): ExpirationType => {
  const day = date.getUTCDate();
  if (day >= 28 || day <= 3) return "monthly";
  if (isThirdFriday(date)) {
    return QUARTER_END_MONTHS.has(date.getUTCMonth()) ? "quarterly" : "monthly";
  }
  if (date.getUTCDay() === FRIDAY) return "weekly";
  return "other";
};

export const parseExpirationType = (value?: string | null): ExpirationType | null => {
  if (value === undefined || value === null) return null;
  return EXPIRATION_TYPE_ALIASES[value.trim().toLowerCase()] ?? "other";
};

const describeInput = (input: RawExpiration) =>
  typeof input === "string" ? input : JSON.stringify(input);

const drop = (
  input: RawExpiration,
  code: DroppedCandidate["code"],
  message: string
): DroppedCandidate => ({ input, code, message });

const fromDate = (input: RawExpiration, rawDate: string, now: Date) => {
  const parsed = parseIsoDate(rawDate);
  if (!parsed) {
    return drop(input, "INVALID_DATE_FORMAT", `Invalid expiration date "${rawDate}".`);
  }
  const days = diffInDays(now, parsed);
  if (days < 0) {
    return drop(input, "EXPIRED", `Expiration ${formatDate(parsed)} is ${-days} days in the past.`);
  }
  return { parsed, days };
};

/**
 * Turns raw descriptors into evaluation inputs. Every day count is measured from the single
 * `now` passed in, so a long batch cannot drift across a day boundary mid-run.
 */
export const normalizeCandidates = (inputs: RawExpiration[], now: Date): NormalizedBatch => {
  const candidates: NormalizedCandidate[] = [];
  const dropped: DroppedCandidate[] = [];

  inputs.forEach((input) => {
    if (typeof input === "string") {
      const resolved = fromDate(input, input, now);
      if ("code" in resolved) {
        dropped.push(resolved);
        return;
      }
      candidates.push({
        date: formatDate(resolved.parsed),
        days: resolved.days,
        expirationType: classifyExpiration(resolved.parsed)
      });
      return;
    }

    const explicitType = parseExpirationType(input.type);
    const activity = {
      daysToNextEarnings: input.daysToNextEarnings ?? null,
      volume: input.volume ?? null,
      openInterest: input.openInterest ?? null
    };

    if (input.days !== undefined) {
      if (!Number.isInteger(input.days) || input.days < 0) {
        dropped.push(
          drop(input, "INVALID_DAYS", `Days to expiry must be a non-negative integer, got ${input.days}.`)
        );
        return;
      }

      let date = formatDate(addDays(now, input.days));
      let inferredType: ExpirationType = "other";
      if (input.date !== undefined) {
        const parsed = parseIsoDate(input.date);
        if (!parsed) {
          dropped.push(drop(input, "INVALID_DATE_FORMAT", `Invalid expiration date "${input.date}".`));
          return;
        }
        date = formatDate(parsed);
        inferredType = classifyExpiration(parsed);
      }

      candidates.push({
        date,
        days: input.days,
        expirationType: explicitType ?? inferredType,
        ...activity
      });
      return;
    }

    if (input.date === undefined) {
      dropped.push(
        drop(input, "MISSING_EXPIRATION", `Candidate ${describeInput(input)} has neither date nor days.`)
      );
      return;
    }

    const resolved = fromDate(input, input.date, now);
    if ("code" in resolved) {
      dropped.push(resolved);
      return;
    }
    candidates.push({
      date: formatDate(resolved.parsed),
      days: resolved.days,
      expirationType: explicitType ?? classifyExpiration(resolved.parsed),
      ...activity
    });
  });

  return { candidates, dropped };
};
