/**
 * Observability hook for the crop pipeline.
 * Stages report through the hook they are handed; the pipeline holds no logger of its own.
 */

export type PipelineStage =
  | "pipeline"
  | "normalize"
  | "refine"
  | "analyze"
  | "scale"
  | "position"
  | "margins"
  | "clamp"
  | "validate";

export type TraceLevel = "debug" | "info" | "warn" | "error";

export interface TraceEvent {
  stage: PipelineStage;
  level: TraceLevel;
  message: string;
  data?: Record<string, number | string | boolean>;
}

export type TraceHook = (event: TraceEvent) => void;

export const noopTrace: TraceHook = () => {};

const formatData = (data: TraceEvent["data"]): string => {
  if (!data) return "";
  const parts = Object.entries(data).map(([key, value]) =>
    typeof value === "number" && !Number.isInteger(value)
      ? `${key}=${value.toFixed(2)}`
      : `${key}=${value}`
  );
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
};

/**
 * Trace hook that writes events to the console
 * @param verbose - Also print debug events
 */
export const createConsoleTrace = (verbose = false): TraceHook => {
  return (event: TraceEvent): void => {
    const line = `[${event.stage}] ${event.message}${formatData(event.data)}`;
    switch (event.level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "debug":
        if (verbose) console.log(line);
        break;
      default:
        console.log(line);
    }
  };
};
