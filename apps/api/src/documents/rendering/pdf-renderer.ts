export interface RenderRequest {
  title: string;
  /** HTML body of the contract */
  content: string;
}

/** Turns contract content into PDF bytes. */
export abstract class PdfRenderer {
  abstract render(request: RenderRequest): Promise<Uint8Array>;
}
