export function toKebabCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n?/g, "\n");
}

export function countWords(content: string): number {
  const trimmed = content.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}

export function formatFileSize(bytes: number): string {
  if (bytes <= 0) return "0 Bytes";
  const k = 1024;
  const sizes = ["Bytes", "KB", "MB", "GB"];
  const index = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  const value = Number.parseFloat((bytes / Math.pow(k, index)).toFixed(2));
  return `${value} ${sizes[index] ?? "Bytes"}`;
}

export function maskSecret(secret: string | undefined): string {
  if (!secret) return "not set";
  return secret.length > 10 ? `${secret.slice(0, 4)}...${secret.slice(-2)}` : "set";
}
