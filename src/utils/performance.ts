export interface QueryStats {
  queryCount: number;
  totalTime: number;
  queries: Array<{
    intent: string;
    duration: number;
  }>;
}

/**
 * リクエスト単位でクエリ数と所要時間を記録する
 */
export class QueryMonitor {
  private stats: QueryStats = {
    queryCount: 0,
    totalTime: 0,
    queries: [],
  };
  private startTime: number = Date.now();

  start() {
    this.stats = {
      queryCount: 0,
      totalTime: 0,
      queries: [],
    };
    this.startTime = Date.now();
  }

  recordQuery(intent: string, duration: number) {
    this.stats.queryCount++;
    this.stats.totalTime += duration;
    this.stats.queries.push({
      intent,
      duration,
    });
  }

  getStats(): QueryStats & { elapsedTime: number } {
    return {
      ...this.stats,
      elapsedTime: Date.now() - this.startTime,
    };
  }

  summary(label: string): string {
    const stats = this.getStats();
    const intents = stats.queries.map((q) => q.intent).join(", ");
    return (
      `${label}: ${stats.queryCount} queries in ${formatDuration(stats.totalTime)}` +
      ` (elapsed ${formatDuration(stats.elapsedTime)})` +
      (intents ? ` [${intents}]` : "")
    );
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1) {
    return `${(ms * 1000).toFixed(2)}μs`;
  } else if (ms < 1000) {
    return `${ms.toFixed(2)}ms`;
  } else {
    return `${(ms / 1000).toFixed(2)}s`;
  }
}
