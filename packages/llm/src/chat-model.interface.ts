import type { ObservationParent } from "@ragweave/observability";

export interface CompleteOptions {
  /** Sequences at which generation stops; not included in the reply. */
  stop?: string[];
  /** Parent observation under which the call is recorded as a generation. */
  observer?: ObservationParent;
  /** Generation name recorded with the call. */
  name?: string;
}

export interface ChatModel {
  readonly modelName: string;
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export type ChatModelFactory = (modelName: string) => ChatModel;
