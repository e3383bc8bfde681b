/**
 * Tandem Engine — Component Catalog
 *
 * File names and well-known locations of the two managed tools and of
 * their predecessors, from data/components.json.
 */

import * as os from "os";
import * as path from "path";
import catalogData from "../data/components.json";

export interface InjectorComponent {
  archive: string;
  executable: string;
  config: string;
  dll: string;
  files: string[];
  appListDir: string;
  shortcutName: string;
}

export interface UnlockerComponent {
  installer: string;
  executable: string;
  config: string;
  configTemplate: string;
  downloadUrl: string;
  installerArgs: string[];
  files: string[];
  shortcutName: string;
}

export interface LegacyLocations {
  injectorDirs: string[];
  injectorMarkers: string[];
  unlockerDirs: string[];
  unlockerMarkers: string[];
  shortcuts: string[];
}

export interface ComponentCatalog {
  injector: InjectorComponent;
  unlocker: UnlockerComponent;
  legacy: LegacyLocations;
}

const catalog: ComponentCatalog = catalogData;

export function loadComponentCatalog(): ComponentCatalog {
  return catalog;
}

/** Expand a leading "~" to `home` */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(home, p.slice(2));
  return p;
}
