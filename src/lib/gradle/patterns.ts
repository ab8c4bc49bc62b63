/**
 * Matchers for the leading sections of a Flutter app's android/app/build.gradle.
 */

import {
  anyOf,
  char,
  literal,
  noneOf,
  oneOf,
  optional,
  plus,
  seq,
  star,
  type Matcher,
} from "../grammar/matcher.js";

const QUOTES = "'\"";

/** Line break plus the indentation of the next line. */
const NEWLINE_SEPARATOR = seq(char("\n"), star(char(" ")));

const QUOTED_VALUE = seq(anyOf(QUOTES), plus(noneOf(QUOTES)), anyOf(QUOTES));

const NEWLINE_RUN = plus(char("\n"));

const LINE_COMMENT = seq(star(char(" ")), literal("//"), star(noneOf("\n")), char("\n"));

/**
 * The `plugins { ... }` block some app templates put at the top of the file:
 *
 * ```groovy
 * plugins {
 *     id "com.android.application"
 *     id 'kotlin-android'
 * }
 * ```
 *
 * Opening and closing quotes are matched independently, so `id "x'` passes.
 */
const LEGACY_PLUGINS_BLOCK = seq(
  literal("plugins {"),
  NEWLINE_SEPARATOR,
  plus(seq(literal("id "), QUOTED_VALUE, NEWLINE_SEPARATOR)),
  literal("}\n")
);

/** One or more blank-line characters. */
export function newlineRun(): Matcher {
  return NEWLINE_RUN;
}

/** A single `//` comment line, optionally indented with spaces. */
export function lineComment(): Matcher {
  return LINE_COMMENT;
}

export function legacyPluginsBlock(): Matcher {
  return LEGACY_PLUGINS_BLOCK;
}

/**
 * Loading a `.properties` file next to the root project, in either the
 * `withReader('UTF-8')` or the `withInputStream` idiom:
 *
 * ```groovy
 * def localProperties = new Properties()
 * def localPropertiesFile = rootProject.file('local.properties')
 * if (localPropertiesFile.exists()) {
 *     localPropertiesFile.withReader('UTF-8') { reader ->
 *         localProperties.load(reader)
 *     }
 * }
 * ```
 */
export function propertiesFileLoadBlock(localVar: string, fileVar: string, fileName: string): Matcher {
  return seq(
    literal(`def ${localVar} = new Properties()`),
    NEWLINE_SEPARATOR,
    literal(`def ${fileVar} = rootProject.file('${fileName}')`),
    NEWLINE_SEPARATOR,
    literal(`if (${fileVar}.exists()) {`),
    NEWLINE_SEPARATOR,
    literal(`${fileVar}.`),
    oneOf(literal("withReader('UTF-8') { reader ->"), literal("withInputStream { stream ->")),
    NEWLINE_SEPARATOR,
    literal(`${localVar}.load(`),
    oneOf(literal("reader"), literal("stream")),
    literal(")"),
    NEWLINE_SEPARATOR,
    literal("}\n}\n")
  );
}

export interface MissingPropertyMessage {
  /** What is missing, e.g. "Flutter SDK". */
  label: string;
  /** How to define it, given the property key, e.g. `location with flutter.sdk`. */
  describe: (key: string) => string;
}

/**
 * A property read from `localProperties` with a fallback when it is unset.
 *
 * The fallback either assigns a literal (`flutterVersionCode = '1'`) or, when
 * `message` is given, may also throw `GradleException` or
 * `FileNotFoundException` with the standard "not found" text.
 */
export function flutterPropertyBlock(name: string, key: string, message?: MissingPropertyMessage): Matcher {
  const assignment = seq(literal(`${name} = `), QUOTED_VALUE);
  const body = message
    ? oneOf(
        seq(
          literal("throw"),
          optional(literal(" new")),
          literal(" "),
          oneOf(literal("GradleException"), literal("FileNotFoundException")),
          literal(
            `("${message.label} not found. Define ${message.describe(key)} in the local.properties file.")`
          )
        ),
        assignment
      )
    : assignment;

  return seq(
    literal(`def ${name} = localProperties.getProperty('${key}')`),
    NEWLINE_SEPARATOR,
    literal(`if (${name} == null) {`),
    NEWLINE_SEPARATOR,
    body,
    NEWLINE_SEPARATOR,
    literal("}\n")
  );
}
