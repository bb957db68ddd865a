/**
 * Named lookup table for guards and side effects.
 *
 * Lets transitions reference reusable predicates and actions by name, which
 * is what makes a definition persistable: the DTO stores names only and a
 * registry turns them back into functions on load.
 *
 * Provides:
 * - Insert-or-overwrite registration (last registration wins)
 * - Read-only lookups for builders and direct callers
 */
import type { Condition, SideEffect } from "./types.js";

/**
 * Registry of named guards and side effects for one context type.
 *
 * Usually longer-lived than any single definition; several definitions can
 * share one registry. Registration is not synchronized: finish registering
 * before machines start looking names up.
 *
 * @example
 * ```typescript
 * const registry = new TransitionRegistry<OrderState, OrderContext>()
 *   .registerCondition("paymentReceived", (ctx) => ctx.paymentReceived)
 *   .registerSideEffect("notifyShipment", (ctx) => ctx.notifications.push("shipped"));
 *
 * const builder = FSMBuilder.create<OrderState, OrderContext>("Order", ORDER_STATES)
 *   .withRegistry(registry)
 *   .withInitialState("Created")
 *   .addTransition("Created", "Paid")
 *   .when("paymentReceived")
 *   .done();
 * ```
 */
export class TransitionRegistry<TState extends string, TContext> {
  private readonly conditionMap = new Map<string, Condition<TContext>>();
  private readonly sideEffectMap = new Map<string, SideEffect<TState, TContext>>();

  /**
   * Registered guards by name.
   */
  get conditions(): ReadonlyMap<string, Condition<TContext>> {
    return this.conditionMap;
  }

  /**
   * Registered side effects by name.
   */
  get sideEffects(): ReadonlyMap<string, SideEffect<TState, TContext>> {
    return this.sideEffectMap;
  }

  /**
   * Register a guard. Overwrites an earlier registration under the same name.
   */
  registerCondition(name: string, condition: Condition<TContext>): this {
    this.conditionMap.set(name, condition);
    return this;
  }

  /**
   * Register a side effect. Overwrites an earlier registration under the same name.
   */
  registerSideEffect(name: string, sideEffect: SideEffect<TState, TContext>): this {
    this.sideEffectMap.set(name, sideEffect);
    return this;
  }

  getCondition(name: string): Condition<TContext> | undefined {
    return this.conditionMap.get(name);
  }

  getSideEffect(name: string): SideEffect<TState, TContext> | undefined {
    return this.sideEffectMap.get(name);
  }

  hasCondition(name: string): boolean {
    return this.conditionMap.has(name);
  }

  hasSideEffect(name: string): boolean {
    return this.sideEffectMap.has(name);
  }
}
