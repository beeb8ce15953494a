import type { InboundMessage, OutboundResponse } from '../types.ts';

export interface PatternContext<TContext = unknown> {
  message: InboundMessage<TContext>;
  match: RegExpExecArray;
  signal?: AbortSignal;
}

export type PatternHandler<TContext = unknown> = (
  ctx: PatternContext<TContext>,
) => OutboundResponse | Promise<OutboundResponse>;

export interface RouteDefinition<TContext = unknown> {
  name: string;
  pattern: RegExp;
  handler: PatternHandler<TContext>;
}

export interface RouteMatch<TContext = unknown> {
  route: RouteDefinition<TContext>;
  match: RegExpExecArray;
}

/**
 * Ordered (regex, handler) bindings. The first route whose pattern matches
 * anywhere in the text wins.
 */
export class PatternMatcher<TContext = unknown> {
  private readonly routes: ReadonlyArray<RouteDefinition<TContext>>;

  constructor(routes: ReadonlyArray<RouteDefinition<TContext>>) {
    const names = new Set<string>();
    this.routes = Object.freeze(
      routes.map((route) => {
        if (names.has(route.name)) {
          throw new Error(`Duplicate route name: ${route.name}`);
        }
        names.add(route.name);
        return { ...route, pattern: stripStatefulFlags(route.pattern) };
      }),
    );
  }

  match(text: string): RouteMatch<TContext> | null {
    for (const route of this.routes) {
      const match = route.pattern.exec(text);
      if (match) {
        return { route, match };
      }
    }
    return null;
  }

  get names(): string[] {
    return this.routes.map((r) => r.name);
  }
}

// g and y make exec() resume from lastIndex, which would leak state between messages
function stripStatefulFlags(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, '');
  return flags === pattern.flags ? pattern : new RegExp(pattern.source, flags);
}
