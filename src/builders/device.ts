import { Device, DevicePad, ManufacturerPart } from "../librepcb/Device";
import { cacheKey } from "../librepcb/UuidCache";
import { BuildContext, LibraryHeader, withGeneratorNote } from "./common";

export interface DevicePadConfig {
  /** Package pad id, e.g. "1" or "p" */
  pad: string;
  /** Component signal name; null leaves the pad unconnected */
  signal: string | null;
}

/** Binds a generated component to a generated package, both by name. */
export interface DeviceConfig {
  name: string;
  description: string;
  keywords: string;
  header: LibraryHeader;
  component: string;
  package: string;
  pads: DevicePadConfig[];
  parts?: Array<{ mpn: string; manufacturer: string }>;
}

/**
 * Build a device. Component, package, pad and signal UUIDs must already
 * be in the cache; a missing one is a configuration error. A device
 * without manufacturer parts carries the `no_parts` approval.
 */
export function buildDevice(config: DeviceConfig, ctx: BuildContext): Device {
  const { cache } = ctx;
  const ids = cache.resolver("dev", config.name);
  const { header } = config;

  const componentUuid = cache.require(cacheKey("cmp", config.component, "cmp"));
  const packageUuid = cache.require(cacheKey("pkg", config.package, "pkg"));

  const device = new Device({
    uuid: ids("dev"),
    name: config.name,
    description: withGeneratorNote(config.description, header),
    keywords: config.keywords,
    author: header.author,
    version: header.version,
    created: header.created,
    generatedBy: header.generatedBy,
    categories: [header.category],
    component: componentUuid,
    package: packageUuid,
  });

  for (const { pad, signal } of config.pads) {
    const padUuid = cache.require(cacheKey("pkg", config.package, `pad-${pad}`));
    const signalUuid = signal === null ? null : cache.require(cacheKey("cmp", config.component, `signal-${signal}`));
    device.addPad(new DevicePad(padUuid, signalUuid));
  }
  const parts = config.parts ?? [];
  for (const part of parts) {
    device.addPart(new ManufacturerPart(part.mpn, part.manufacturer));
  }
  if (parts.length === 0) {
    device.addApproval("(approved no_parts)");
  }
  return device;
}
