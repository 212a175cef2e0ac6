import type { StatusCallback } from "./contracts.js";
import { startLiveStatus } from "./status.js";

export async function runWithLiveStatus<T>(
  model: string,
  onStatus: StatusCallback | undefined,
  runTask: () => Promise<T>
): Promise<T> {
  const stopLiveStatus = startLiveStatus(model, onStatus);
  try {
    return await runTask();
  } finally {
    stopLiveStatus();
  }
}
