import type { CompilationUnitDescriptor, PackageDescriptor, TypeIdentifier } from "./types.js";

/** Strip generic arguments: `a.Outer<T>.Inner<java.util.List<U>>` → `a.Outer.Inner`. */
export function eraseTypeName(name: string): string {
  let depth = 0;
  let out = "";
  for (const ch of name) {
    if (ch === "<") {
      depth++;
    } else if (ch === ">") {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      out += ch;
    }
  }
  return out.trim();
}

export function packageDescriptor(name: string | null | undefined): PackageDescriptor | null {
  if (name === null || name === undefined) return null;
  return { name };
}

/**
 * Build a TypeIdentifier from a (possibly generic) qualified name.
 *
 * Without `packageName`, everything before the last dot is taken as the package.
 * With it, names of member types keep their outer type in the qualified name
 * while the simple name is the last segment.
 */
export function createTypeIdentifier(name: string, packageName?: string): TypeIdentifier {
  const qualifiedName = eraseTypeName(name);
  const lastDot = qualifiedName.lastIndexOf(".");
  const simpleName = lastDot < 0 ? qualifiedName : qualifiedName.slice(lastDot + 1);
  const pkg = packageName ?? (lastDot < 0 ? "" : qualifiedName.slice(0, lastDot));
  return {
    qualifiedName,
    simpleName,
    package: packageDescriptor(pkg),
  };
}

export function createCompilationUnit(
  packageName: string | null,
  mainTypeName: string,
): CompilationUnitDescriptor {
  return { package: packageDescriptor(packageName), mainTypeName };
}
