import {
  BatchResult,
  MessageType,
  SAMPLE_STATUS,
  Sample,
  SampleOutcome,
  logError,
  logInfo,
  logSuccess,
  logWarning,
} from 'longread-qc-core';

function formatDuration(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(1)}s`;
}

/**
 * BatchProgressUI renders batch progress as append-only log lines on stderr:
 * - Info (blue ℹ): batch start, sample start, read and base counts
 * - Success (green ✓): sample completed
 * - Error (red ✖): sample failed
 * - Warning (yellow ⚠): interruption and other warnings
 *
 * Each sample line carries a `[n/total]` prefix with the sample's position in
 * discovery order, so lines stay attributable when samples run concurrently.
 */
export class BatchProgressUI {
  private total = 0;

  /**
   * Resets the UI for a batch of the given size.
   */
  initialize(totalSamples: number): void {
    this.total = totalSamples;
    this.appendMessage(`Processing ${totalSamples} sample(s)`, MessageType.INFO);
  }

  startSample(sample: Sample, index: number): void {
    this.appendMessage(`${this.prefix(index)} Processing: ${sample.id}`, MessageType.INFO);
  }

  completeSample(outcome: SampleOutcome, index: number): void {
    if (outcome.status === SAMPLE_STATUS.SUCCESS) {
      this.appendMessage(`${this.prefix(index)} Successfully processed: ${outcome.sampleId} in ${formatDuration(outcome.durationMs)}`,
                         MessageType.SUCCESS);
      if (outcome.readsBefore !== undefined || outcome.readsAfter !== undefined) {
        this.appendMessage(`  Reads before: ${outcome.readsBefore ?? 'N/A'}`, MessageType.INFO);
        this.appendMessage(`  Reads after: ${outcome.readsAfter ?? 'N/A'}`, MessageType.INFO);
      }
      if (outcome.basesBefore !== undefined || outcome.basesAfter !== undefined) {
        this.appendMessage(`  Bases before: ${outcome.basesBefore ?? 'N/A'}`, MessageType.INFO);
        this.appendMessage(`  Bases after: ${outcome.basesAfter ?? 'N/A'}`, MessageType.INFO);
      }
      return;
    }

    this.appendMessage(`${this.prefix(index)} Failed to process: ${outcome.sampleId} (${outcome.error ?? 'unknown error'})`,
                       MessageType.ERROR);
  }

  /**
   * Prints the closing totals once the batch result is final.
   */
  complete(result: BatchResult): void {
    if (result.cancelled) {
      this.appendMessage('Batch interrupted; queued samples were not processed', MessageType.WARNING);
    } else {
      this.appendMessage('Pipeline completed', MessageType.SUCCESS);
    }
    this.appendMessage(`Processed files: ${result.processedCount}`, MessageType.INFO);
    if (result.failedCount > 0) {
      this.appendMessage(`Failed files: ${result.failedCount} (see per-sample logs)`, MessageType.WARNING);
    }
  }

  private prefix(index: number): string {
    return `[${index + 1}/${this.total}]`;
  }

  private appendMessage(message: string, type: MessageType): void {
    switch (type) {
      case MessageType.SUCCESS:
        logSuccess(message);
        break;
      case MessageType.WARNING:
        logWarning(message);
        break;
      case MessageType.ERROR:
        logError(message);
        break;
      default:
        logInfo(message);
    }
  }
}
