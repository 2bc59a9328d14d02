/**
 * Example 01: Ancestor Chains
 *
 * This example demonstrates resolving ancestor chains across two
 * hierarchies, one with single inheritance and one with a diamond:
 *
 *                                     F
 *                                    / \
 *      A                            H   \
 *     / \                          / \   \
 *    B   C                        I   J   G
 *   /   / \                        \ /   / \
 *  T   D   E                        K   L   Z
 *                                   |
 *                                   W
 *
 * - Declaring the hierarchy with inherits(...)
 * - Registering entities to a catalog in any order, duplicates included
 * - Resolving and visiting the ancestors of an instance
 */
import {
  Catalog,
  createInspector,
  defineHierarchy,
  inherits,
  SequenceCounter,
} from "lineage";

// ============================================================
// Define the Hierarchies
// ============================================================

const hierarchy = defineHierarchy([
  inherits("B", "A"),
  inherits("C", "A"),
  inherits("T", "B"),
  inherits("D", "C"),
  inherits("E", "C"),
  inherits("G", "F"),
  inherits("H", "F"),
  inherits("L", "G"),
  inherits("Z", "G"),
  inherits("I", "H"),
  inherits("J", "H"),
  inherits("K", "I", "J"),
  inherits("W", "K"),
]);

// ============================================================
// Main Example
// ============================================================

export async function main(): Promise<void> {
  const inspector = createInspector({ isAncestorOf: hierarchy.isAncestorOf });

  console.log("=== Registering Entities ===\n");

  // Registration order and repeats do not matter
  inspector.declareCatalog("Classes");
  for (const entity of ["C", "D", "E", "T", "B", "A", "A", "A"]) {
    inspector.register("Classes", entity);
  }
  for (const entity of ["F", "G", "L", "Z", "H", "I", "J", "K", "W"]) {
    inspector.register("Classes", entity);
  }

  console.log("Registered:", inspector.snapshotLatest("Classes").join(", "));

  console.log("\n=== Resolving Ancestors ===\n");

  for (const entity of ["D", "K", "W"]) {
    const chain = inspector.resolveAncestors(entity, "Classes");
    console.log(`${entity}: ${chain.join(" -> ")}`);
  }

  console.log("\n=== Visiting an Instance ===\n");

  const instance = { id: "w-1", kind: "W" };
  inspector.visit(instance, instance.kind, "Classes", (ancestor, target) => {
    console.log(`  instance ${target.id}: as type '${ancestor}'`);
  });

  console.log("\n=== Membership ===\n");

  console.log("Is Z registered?", inspector.containsLatest("Z", "Classes"));
  console.log("Is ZZ registered?", inspector.containsLatest("ZZ", "Classes"));

  // A private counter keeps this catalog's numbering independent
  const isolated = createInspector({
    isAncestorOf: hierarchy.isAncestorOf,
    catalog: new Catalog<string>({ counter: new SequenceCounter() }),
    order: "declaration",
  });
  isolated.declareCatalog("Diamond");
  for (const entity of ["I", "J", "H", "F", "K"]) {
    isolated.register("Diamond", entity);
  }
  console.log(
    "\nK with declaration order:",
    isolated.resolveAncestors("K", "Diamond").join(" -> "),
  );
  console.log("Diamond history:", isolated.catalog.history("Diamond").length);

  console.log("\n=== Ancestor chains example complete ===");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
