/** Injection token for the active {@link TemplateRenderer}. */
export const TEMPLATE_RENDERER = Symbol('TEMPLATE_RENDERER');

export type RenderedContent = {
  html?: string;
  text?: string;
};

/**
 * Turns a stored template reference into message bodies at dispatch time.
 * Rejects with a DeliveryError; anything else is treated as permanent.
 */
export interface TemplateRenderer {
  render(
    templateId: string,
    vars: Record<string, unknown>,
  ): Promise<RenderedContent>;
}
