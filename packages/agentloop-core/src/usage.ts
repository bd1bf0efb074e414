import type { RequestUsageData, UsageData } from './types/protocol';

type RequestUsageInput = Partial<RequestUsageData>;

type UsageInput = Partial<Omit<UsageData, 'requestUsageEntries'>> & {
  requestUsageEntries?: (RequestUsageInput | RequestUsage)[];
};

/**
 * Usage details for a single model request.
 */
export class RequestUsage {
  /**
   * The number of input tokens used for this request.
   */
  public inputTokens: number;

  /**
   * The number of output tokens used for this request.
   */
  public outputTokens: number;

  /**
   * The total number of tokens sent and received for this request.
   */
  public totalTokens: number;

  /**
   * Details about the input tokens used for this request.
   */
  public inputTokensDetails: Record<string, number>;

  /**
   * Details about the output tokens used for this request.
   */
  public outputTokensDetails: Record<string, number>;

  constructor(input?: RequestUsageInput) {
    this.inputTokens = input?.inputTokens ?? 0;
    this.outputTokens = input?.outputTokens ?? 0;
    this.totalTokens =
      input?.totalTokens ?? this.inputTokens + this.outputTokens;
    this.inputTokensDetails = { ...(input?.inputTokensDetails ?? {}) };
    this.outputTokensDetails = { ...(input?.outputTokensDetails ?? {}) };
  }

  toJSON(): RequestUsageData {
    return {
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.totalTokens,
      inputTokensDetails: { ...this.inputTokensDetails },
      outputTokensDetails: { ...this.outputTokensDetails },
    };
  }
}

/**
 * Tracks token usage and request counts for a run.
 */
export class Usage {
  /**
   * The number of requests made to the model.
   */
  public requests: number;

  /**
   * The number of input tokens used across all requests.
   */
  public inputTokens: number;

  /**
   * The number of output tokens used across all requests.
   */
  public outputTokens: number;

  /**
   * The total number of tokens sent and received, across all requests.
   */
  public totalTokens: number;

  /**
   * Details about the input tokens used across all requests.
   */
  public inputTokensDetails: Array<Record<string, number>> = [];

  /**
   * Details about the output tokens used across all requests.
   */
  public outputTokensDetails: Array<Record<string, number>> = [];

  /**
   * List of per-request usage entries for detailed cost calculations.
   */
  public requestUsageEntries: RequestUsage[] | undefined;

  constructor(input?: UsageInput) {
    if (typeof input === 'undefined') {
      this.requests = 0;
      this.inputTokens = 0;
      this.outputTokens = 0;
      this.totalTokens = 0;
      this.requestUsageEntries = undefined;
      return;
    }

    this.requests = input.requests ?? 1;
    this.inputTokens = input.inputTokens ?? 0;
    this.outputTokens = input.outputTokens ?? 0;
    this.totalTokens =
      input.totalTokens ?? this.inputTokens + this.outputTokens;
    this.inputTokensDetails = [...(input.inputTokensDetails ?? [])];
    this.outputTokensDetails = [...(input.outputTokensDetails ?? [])];

    const entries = input.requestUsageEntries?.map((entry) =>
      entry instanceof RequestUsage ? entry : new RequestUsage(entry),
    );
    this.requestUsageEntries =
      entries && entries.length > 0 ? entries : undefined;
  }

  /**
   * Usage for a model call that failed before the provider reported any token counts. The
   * request itself still counts.
   */
  static failedRequest(): Usage {
    return new Usage({ requests: 1 });
  }

  add(newUsage: Usage) {
    this.requests += newUsage.requests;
    this.inputTokens += newUsage.inputTokens;
    this.outputTokens += newUsage.outputTokens;
    this.totalTokens += newUsage.totalTokens;
    this.inputTokensDetails.push(...newUsage.inputTokensDetails);
    this.outputTokensDetails.push(...newUsage.outputTokensDetails);

    if (
      Array.isArray(newUsage.requestUsageEntries) &&
      newUsage.requestUsageEntries.length > 0
    ) {
      this.requestUsageEntries ??= [];
      this.requestUsageEntries.push(...newUsage.requestUsageEntries);
    } else if (newUsage.requests === 1 && newUsage.totalTokens > 0) {
      this.requestUsageEntries ??= [];
      this.requestUsageEntries.push(
        new RequestUsage({
          inputTokens: newUsage.inputTokens,
          outputTokens: newUsage.outputTokens,
          totalTokens: newUsage.totalTokens,
          inputTokensDetails: newUsage.inputTokensDetails[0],
          outputTokensDetails: newUsage.outputTokensDetails[0],
        }),
      );
    }
  }

  toJSON(): UsageData {
    const json: UsageData = {
      requests: this.requests,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.totalTokens,
      inputTokensDetails: this.inputTokensDetails.map((entry) => ({
        ...entry,
      })),
      outputTokensDetails: this.outputTokensDetails.map((entry) => ({
        ...entry,
      })),
    };
    if (this.requestUsageEntries) {
      json.requestUsageEntries = this.requestUsageEntries.map((entry) =>
        entry.toJSON(),
      );
    }
    return json;
  }
}

export type { RequestUsageData, UsageData };
