/**
 * Example 02: Class Dispatch
 *
 * This example demonstrates per-level dispatch over JavaScript classes:
 * - Using class constructors as descriptors with classHierarchy
 * - A handler table indexed by class, run for every ancestor level
 * - Snapshots taken before later registrations
 */
import {
  type AnyClass,
  Catalog,
  classHierarchy,
  createHandlerTable,
  createInspector,
  SequenceCounter,
} from "lineage";

// ============================================================
// Define Classes
// ============================================================

class Shape {
  constructor(readonly id: string) {}
}

class Polygon extends Shape {
  sides = 0;
}

class Square extends Polygon {
  override sides = 4;
}

class Circle extends Shape {
  radius = 1;
}

// ============================================================
// Main Example
// ============================================================

export async function main(): Promise<void> {
  const inspector = createInspector<AnyClass>({
    isAncestorOf: classHierarchy,
    catalog: new Catalog<AnyClass>({ counter: new SequenceCounter() }),
  });

  inspector.declareCatalog("Shapes");
  inspector.register("Shapes", Square);
  const beforePolygon = inspector.register("Shapes", Shape);
  inspector.register("Shapes", Circle);
  inspector.register("Shapes", Polygon);

  console.log("=== Chains ===\n");

  const square = new Square("sq-1");
  const chain = inspector.resolveAncestors(Square, "Shapes");
  console.log("Square:", chain.map((type) => type.name).join(" -> "));

  const earlier = inspector.resolveAncestorsAt(Square, "Shapes", beforePolygon);
  console.log(
    `Square as of ${beforePolygon}:`,
    earlier.map((type) => type.name).join(" -> "),
  );

  console.log("\n=== Handler Table ===\n");

  const describe = createHandlerTable<AnyClass, Square>()
    .on(Shape, (shape) => {
      console.log(`  Shape: id=${shape.id}`);
    })
    .on(Polygon, (polygon) => {
      console.log(`  Polygon: sides=${polygon.sides}`);
    });

  const handled = describe.dispatch(square, chain);
  console.log(`\nHandled ${handled.length} of ${chain.length} levels`);

  console.log("\n=== Class dispatch example complete ===");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
