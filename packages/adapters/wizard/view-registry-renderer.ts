/**
 * ViewRegistryRenderer
 *
 * IViewRenderer over a registry of view functions keyed by template id.
 */

import type { IViewRenderer, ViewContext } from '@stepwise/core/ports';

/**
 * A view: renders a context to a response body.
 */
export type View = (context: ViewContext) => string;

/**
 * Raised when a template id has no registered view.
 */
export class ViewNotFoundError extends Error {
  constructor(public readonly templateId: string) {
    super(`View "${templateId}" is not registered`);
    this.name = 'ViewNotFoundError';
  }
}

export class ViewRegistryRenderer implements IViewRenderer {
  private readonly views = new Map<string, View>();

  constructor(views: Record<string, View> = {}) {
    for (const [templateId, view] of Object.entries(views)) {
      this.register(templateId, view);
    }
  }

  register(templateId: string, view: View): this {
    this.views.set(templateId, view);
    return this;
  }

  has(templateId: string): boolean {
    return this.views.has(templateId);
  }

  render(templateId: string, context: ViewContext): string {
    const view = this.views.get(templateId);
    if (!view) {
      throw new ViewNotFoundError(templateId);
    }
    return view(context);
  }
}
