/**
 * Orchestrator stages, in the order a request moves through them.
 */
export enum ProcessingStage {
  INIT = 'INIT',
  DOWNLOADING = 'DOWNLOADING',
  EXTRACTING = 'EXTRACTING',
  PACKAGING = 'PACKAGING',
  UPLOADING = 'UPLOADING',
  NOTIFYING = 'NOTIFYING',
  DONE = 'DONE',
}
