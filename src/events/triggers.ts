/**
 * Event triggers
 *
 * A trigger (`onClick`, `onChange`, ...) maps the client's native event
 * object to the Vars passed positionally to the bound handler. Binding a
 * handler reference to a trigger produces an EventSpec whose arguments are
 * Vars; formatting it renders the client-side call.
 */

import { z } from 'zod';
import { EventPayloadError } from '../common/errors';
import { Var } from '../vars/var';
import { EventSpec, type AnyEventRef } from './event';

/** The native event object inside a rendered trigger handler. */
export const EVENT_ARG = Var.raw(
  '_e',
  z.object({
    target: z.object({
      value: z.string(),
      checked: z.boolean(),
    }),
    key: z.string(),
    clientX: z.number(),
    clientY: z.number(),
  })
);

export type TriggerArgs = (event: Var) => Var[];

const noArgs: TriggerArgs = () => [];
const targetValue: TriggerArgs = (e) => [e.attr('target').attr('value')];
const key: TriggerArgs = (e) => [e.attr('key')];

export const TRIGGERS: Readonly<Record<string, TriggerArgs>> = {
  onClick: noArgs,
  onDoubleClick: noArgs,
  onContextMenu: noArgs,
  onMouseDown: noArgs,
  onMouseUp: noArgs,
  onMouseEnter: noArgs,
  onMouseLeave: noArgs,
  onMouseMove: noArgs,
  onMouseOver: noArgs,
  onMouseOut: noArgs,
  onScroll: noArgs,
  onSubmit: noArgs,
  onMount: noArgs,
  onUnmount: noArgs,
  onChange: targetValue,
  onBlur: targetValue,
  onFocus: targetValue,
  onKeyDown: key,
  onKeyUp: key,
  onCheckedChange: (e) => [e.attr('target').attr('checked')],
};

/**
 * Bind a handler to a trigger. A handler without arguments ignores the
 * trigger's values; otherwise the counts must match.
 */
export function bindTrigger(
  trigger: string,
  ref: AnyEventRef,
  triggers: Readonly<Record<string, TriggerArgs>> = TRIGGERS
): EventSpec {
  const argsOf = triggers[trigger];
  if (!argsOf) {
    throw new EventPayloadError(ref.fullName, `unknown trigger '${trigger}'`);
  }
  const base = ref();
  if (ref.argNames.length === 0) return base;

  const values = argsOf(EVENT_ARG);
  if (values.length !== ref.argNames.length) {
    throw new EventPayloadError(
      ref.fullName,
      `trigger '${trigger}' passes ${values.length} argument(s) but the handler takes ${ref.argNames.length}`
    );
  }
  const args: Record<string, unknown> = { ...base.args };
  ref.argNames.forEach((name, i) => {
    args[name] = values[i];
  });
  return new EventSpec(base.handler, args);
}

/** `E("state.handler", {name:expr,...})` */
export function formatEventSpec(spec: EventSpec): string {
  const args = Object.entries(spec.args)
    .map(([name, value]) => `${name}:${Var.create(value).fullName}`)
    .join(',');
  return `E(${JSON.stringify(spec.handler)}, {${args}})`;
}

/** `(_e) => Event([E(...), ...])` */
export function formatTriggerHandler(
  specs: readonly EventSpec[],
  localArgs: readonly string[] = [EVENT_ARG.expr]
): string {
  const events = specs.map(formatEventSpec).join(', ');
  return `(${localArgs.join(', ')}) => Event([${events}])`;
}
