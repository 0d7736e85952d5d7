/**
 * Public packages shipped with the translator's runtime libraries.
 *
 * Types in these packages always use package directories, so platform headers
 * stay findable when the project itself suppresses package directories.
 */
export const PLATFORM_PACKAGES: ReadonlySet<string> = new Set([
  "android",
  "com.android.internal.util",
  "com.google.common",
  "com.google.common.annotations",
  "com.google.common.base",
  "com.google.common.cache",
  "com.google.common.collect",
  "com.google.common.hash",
  "com.google.common.io",
  "com.google.common.math",
  "com.google.common.net",
  "com.google.common.primitives",
  "com.google.common.util",
  "com.google.j2objc",
  "com.google.protobuf",
  "dalvik",
  "java",
  "javax",
  "junit",
  "libcore",
  "org.apache.harmony",
  "org.hamcrest",
  "org.json",
  "org.junit",
  "org.kxml2",
  "org.mockito",
  "org.w3c",
  "org.xml.sax",
  "org.xmlpull",
  "sun.misc",
]);

/**
 * True when any dotted prefix of `packageName` (`a`, `a.b`, `a.b.c`, …) is a
 * platform package. Comparison is exact per prefix.
 */
export function isPlatformPackage(packageName: string): boolean {
  if (!packageName) return false;
  let prefix = "";
  for (const part of packageName.split(".")) {
    prefix = prefix ? `${prefix}.${part}` : part;
    if (PLATFORM_PACKAGES.has(prefix)) {
      return true;
    }
  }
  return false;
}
