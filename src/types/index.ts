export type {
  CandidateFailed,
  CandidateOutcome,
  CandidateSucceeded,
  DownloadRecord,
  Link,
  Manifest,
  RunState,
} from "./models";
