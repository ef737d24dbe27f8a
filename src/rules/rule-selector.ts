import { RequestContext } from '../admission/request-context';
import { RuleSelector } from './rule.types';

/**
 * Route patterns match exactly, or by prefix when they end in `*`.
 */
export function routeMatches(pattern: string, route: string): boolean {
  if (pattern.endsWith('*')) {
    return route.startsWith(pattern.slice(0, -1));
  }
  return pattern === route;
}

export function selectorMatches(
  selector: RuleSelector,
  context: RequestContext,
): boolean {
  if (
    selector.routes.length > 0 &&
    !selector.routes.some((pattern) => routeMatches(pattern, context.route))
  ) {
    return false;
  }
  if (
    selector.methods.length > 0 &&
    !selector.methods.includes(context.method)
  ) {
    return false;
  }
  if (selector.backends.length > 0) {
    return (
      context.backendId !== null && selector.backends.includes(context.backendId)
    );
  }
  return true;
}
