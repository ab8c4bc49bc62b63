import { GrammarError } from "../errors.js";
import type { Matcher } from "../grammar/matcher.js";
import {
  flutterPropertyBlock,
  legacyPluginsBlock,
  lineComment,
  newlineRun,
  propertiesFileLoadBlock,
} from "./patterns.js";

export interface SectionDescriptor {
  id: string;
  matcher: Matcher;
  /** May match any number of times and is never reported missing. */
  isPersistent: boolean;
  /** Must be matched once before the scan may stop (ignored when persistent). */
  isRequired: boolean;
}

/** Descriptors in tie-break order. Ids are unique. */
export type SectionRegistry = readonly SectionDescriptor[];

export const SectionId = {
  Comment: "comment",
  Newline: "newline",
  OldPlugins: "old_plugins",
  LocalProperties: "localProperties",
  KeystoreProperties: "keystoreProperties",
  FlutterRoot: "flutterRoot",
  FlutterVersionCode: "flutterVersionCode",
  FlutterVersionName: "flutterVersionName",
} as const;

export const PROFILES = ["build-gradle", "build-gradle-versions"] as const;

export type ProfileName = (typeof PROFILES)[number];

export const DEFAULT_PROFILE: ProfileName = "build-gradle";

export function isProfileName(value: string): value is ProfileName {
  return (PROFILES as readonly string[]).includes(value);
}

/**
 * Freezes a list of descriptors into a registry, rejecting duplicate ids.
 */
export function defineRegistry(descriptors: SectionDescriptor[]): SectionRegistry {
  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    if (seen.has(descriptor.id)) {
      throw new GrammarError(`Duplicate section id: ${descriptor.id}`);
    }
    seen.add(descriptor.id);
  }
  return Object.freeze(descriptors.map((d) => Object.freeze({ ...d })));
}

function buildGradleSections(): SectionDescriptor[] {
  return [
    {
      id: SectionId.Comment,
      matcher: lineComment(),
      isPersistent: true,
      isRequired: false,
    },
    {
      id: SectionId.Newline,
      matcher: newlineRun(),
      isPersistent: true,
      isRequired: false,
    },
    {
      id: SectionId.OldPlugins,
      matcher: legacyPluginsBlock(),
      isPersistent: false,
      isRequired: false,
    },
    {
      id: SectionId.LocalProperties,
      matcher: propertiesFileLoadBlock("localProperties", "localPropertiesFile", "local.properties"),
      isPersistent: false,
      isRequired: true,
    },
    {
      id: SectionId.KeystoreProperties,
      matcher: propertiesFileLoadBlock("keystoreProperties", "keystorePropertiesFile", "key.properties"),
      isPersistent: false,
      isRequired: false,
    },
    {
      id: SectionId.FlutterRoot,
      matcher: flutterPropertyBlock("flutterRoot", "flutter.sdk", {
        label: "Flutter SDK",
        describe: (key) => `location with ${key}`,
      }),
      isPersistent: false,
      isRequired: true,
    },
  ];
}

function versionSections(): SectionDescriptor[] {
  return [
    {
      id: SectionId.FlutterVersionCode,
      matcher: flutterPropertyBlock("flutterVersionCode", "flutter.versionCode"),
      isPersistent: false,
      isRequired: false,
    },
    {
      id: SectionId.FlutterVersionName,
      matcher: flutterPropertyBlock("flutterVersionName", "flutter.versionName"),
      isPersistent: false,
      isRequired: false,
    },
  ];
}

/**
 * Builds a fresh registry for one file.
 */
export function createRegistry(profile: ProfileName = DEFAULT_PROFILE): SectionRegistry {
  switch (profile) {
    case "build-gradle":
      return defineRegistry(buildGradleSections());
    case "build-gradle-versions":
      return defineRegistry([...buildGradleSections(), ...versionSections()]);
  }
}
