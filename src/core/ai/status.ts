import type { StatusCallback } from "./contracts.js";

export function startLiveStatus(model: string, onStatus?: StatusCallback): () => void {
  if (!onStatus) return () => {};

  const cycle = [
    `Waiting for ${model} to draft the journal entry...`,
    `${model} is writing the reflection...`,
    `Still waiting on ${model}...`
  ];

  const startedAt = Date.now();
  let index = 0;
  const timer = setInterval(() => {
    const elapsedSeconds = Math.floor((Date.now() - startedAt) / 1000);
    onStatus(`${cycle[index % cycle.length]} (${elapsedSeconds}s)`);
    index += 1;
  }, 1400);

  return () => clearInterval(timer);
}
