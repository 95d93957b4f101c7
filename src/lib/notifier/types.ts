/** A published archival resource. Extra search fields pass through untouched. */
export type PublishedRecord = {
  uri: string;
  title: string;
  [field: string]: unknown;
};

export type ArrangementMapRecord = {
  uri: string;
  title: string;
  ref: string;
};

/** Anything that can be rendered as a deep link. */
export type LinkableRecord = { uri: string; title: string };

export type SeenSet = PublishedRecord[];

export type ReportingWindow = { from: Date; to: Date };

export type MessageCardSection = { title: string; text: string };

export type MessageCard = {
  "@type": "MessageCard";
  "@context": "https://schema.org/extensions";
  title: string;
  summary: string;
  sections: MessageCardSection[];
};

export type RunLog = { ts: string; phase: string; message: string };

export type NotifierRunResult = {
  window: { from: string; to: string };
  fetchedCount: number;
  newCollections: number;
  updatedMaps: number;
  posted: boolean;
  saved: boolean;
  logs: RunLog[];
};
