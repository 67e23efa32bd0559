/**
 * 以固定上限並行處理 items
 *
 * 同時最多 limit 個 worker 在跑，每個 worker 完成後取下一個 item。
 * 結果依輸入順序回傳；worker 拋出的錯誤會讓整體 reject，
 * 呼叫端若要容忍單筆失敗，需在 worker 內自行轉為結果值。
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError('limit must be a positive integer');
  }
  if (items.length === 0) return [];

  const results = new Array<R>(items.length);
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => runLane());
  await Promise.all(lanes);
  return results;
}
