import { Injectable } from '@nestjs/common';
import { RequestContext } from '../admission/request-context';
import { RuleSnapshot, WafAction, WafRule } from '../rules/rule.types';
import { RateSignal, matches } from './waf-matchers';

export type WafVerdict = 'allow' | 'block' | 'log';

export interface WafEvaluation {
  verdict: WafVerdict;
  /** The rule that ended evaluation (block or explicit allow). */
  matchedRule: WafRule | null;
  /** Ids of `log` rules matched before evaluation ended. */
  logged: string[];
}

/**
 * Evaluates WAF rules in (priority, document order). The first matching
 * `block` or `allow` rule ends evaluation; `log` matches accumulate.
 *
 * Evaluation has no side effects, so the same context and snapshot always
 * yield the same result.
 */
@Injectable()
export class WafEngineService {
  evaluate(
    context: RequestContext,
    snapshot: RuleSnapshot,
    rateSignal: RateSignal | null = null,
  ): WafEvaluation {
    const logged: string[] = [];

    for (const rule of snapshot.wafRules) {
      if (!matches(rule.matcher, context, rateSignal)) {
        continue;
      }
      switch (rule.action) {
        case WafAction.BLOCK:
          return { verdict: 'block', matchedRule: rule, logged };
        case WafAction.ALLOW:
          return { verdict: 'allow', matchedRule: rule, logged };
        case WafAction.LOG:
          logged.push(rule.id);
          break;
      }
    }

    return {
      verdict: logged.length > 0 ? 'log' : 'allow',
      matchedRule: null,
      logged,
    };
  }
}
