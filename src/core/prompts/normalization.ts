import { STANDARD_QUESTIONS } from "./constants.js";

function normalizeText(value: string | undefined): string | undefined {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
}

function todayIsoDate(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function resolveQuestions(useStandardQuestions: boolean, extraQuestions: readonly string[] | undefined): string[] {
  const base: string[] = useStandardQuestions ? [...STANDARD_QUESTIONS] : [];
  return [...base, ...(extraQuestions ?? [])];
}

function matchProjectChoice(value: string | undefined, projects: readonly string[]): string | undefined {
  const normalized = normalizeText(value)?.toLowerCase();
  if (!normalized) return undefined;
  return projects.find((project) => project.toLowerCase() === normalized);
}

export { matchProjectChoice, normalizeText, resolveQuestions, todayIsoDate };
