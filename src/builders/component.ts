import { Component, Gate, PinSignalMap, Signal, SignalRole, Variant } from "../librepcb/Component";
import { cacheKey } from "../librepcb/UuidCache";
import { BuildContext, LibraryHeader, withGeneratorNote } from "./common";

export interface SignalConfig {
  name: string;
  /** Name of the symbol pin the signal is drawn on */
  pin: string;
  role?: SignalRole;
  required?: boolean;
}

/** A component with a single gate on a symbol generated before it. */
export interface ComponentConfig {
  name: string;
  description: string;
  keywords: string;
  header: LibraryHeader;
  prefix: string;
  defaultValue: string;
  /** Symbol name, as generated from symbols.yml */
  symbol: string;
  norm?: string;
  signals: SignalConfig[];
}

/**
 * Build a component. The symbol and its pins must already be in the
 * cache; they are looked up before the component gets any UUID.
 */
export function buildComponent(config: ComponentConfig, ctx: BuildContext): Component {
  const { cache } = ctx;
  const symbolUuid = cache.require(cacheKey("sym", config.symbol, "sym"));
  const pinUuids = config.signals.map((signal) => cache.require(cacheKey("sym", config.symbol, `pin-${signal.pin}`)));

  const ids = cache.resolver("cmp", config.name);
  const { header } = config;
  const component = new Component({
    uuid: ids("cmp"),
    name: config.name,
    description: withGeneratorNote(config.description, header),
    keywords: config.keywords,
    author: header.author,
    version: header.version,
    created: header.created,
    generatedBy: header.generatedBy,
    categories: [header.category],
    prefix: config.prefix,
    defaultValue: config.defaultValue,
  });

  const gate = new Gate(ids("gate-default"), symbolUuid);
  config.signals.forEach((signal, i) => {
    const uuid = ids(`signal-${signal.name}`);
    component.addSignal(new Signal(uuid, signal.name, signal.role, signal.required));
    gate.addPin(new PinSignalMap(pinUuids[i], uuid));
  });
  component.addVariant(new Variant(ids("variant-default"), "default", "", config.norm).addGate(gate));
  return component;
}
