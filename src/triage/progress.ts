export type TriageProgressPhase = "ingest" | "triage" | "index";

export type TriageProgressEvent = {
  phase: TriageProgressPhase;
  current: number;
  total: number;
  message?: string;
};

export type TriageProgressHandler = (event: TriageProgressEvent) => void;
