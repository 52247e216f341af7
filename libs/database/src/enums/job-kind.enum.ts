/** Kinds of work the job runner knows how to execute. */
export enum JobKind {
  PDF_GENERATION = 'PDF_GENERATION',
  AI_GENERATION = 'AI_GENERATION',
  /** Rework of existing AI content guided by user feedback */
  AI_REGENERATION = 'AI_REGENERATION',
}
