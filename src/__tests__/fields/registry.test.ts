import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../../config/config.js";
import { resetDeprecationWarnings } from "../../config/deprecation.js";
import { silentLogger } from "../../config/logger.js";
import { ConfigError, UnknownFieldError } from "../../errors/errors.js";
import { createFieldRegistry } from "../../fields/registry.js";
import { createSpyLogger } from "../fixtures.js";

beforeEach(() => {
  configure({ logger: silentLogger });
  resetDeprecationWarnings();
});

afterEach(() => {
  resetConfig();
});

describe("createFieldRegistry()", () => {
  it("declares string fields by default", () => {
    const registry = createFieldRegistry("Address");
    const declaration = registry.declare("city");
    expect(declaration).toEqual({
      name: "city",
      type: "string",
      hasDefault: false,
      default: undefined,
      serializer: undefined,
      storedAs: "city",
      storeAsString: undefined,
      storeAsNative: undefined,
    });
  });

  it("keeps declaration order", () => {
    const registry = createFieldRegistry("Address");
    registry.declare("city");
    registry.declare("zip", "integer");
    registry.declare("deliverable", "boolean");
    expect(registry.fieldSet().map((f) => f.name)).toEqual(["city", "zip", "deliverable"]);
  });

  it("lets the last declaration win", () => {
    const registry = createFieldRegistry("Address");
    registry.declare("zip", "string");
    registry.declare("zip", "integer", { default: 0 });
    expect(registry.get("zip").type).toBe("integer");
    expect(registry.get("zip").hasDefault).toBe(true);
    expect(registry.fieldSet()).toHaveLength(1);
  });

  it("bumps the version on every change", () => {
    const registry = createFieldRegistry("Address");
    expect(registry.version()).toBe(0);
    registry.declare("city");
    registry.wrap("city", {});
    registry.undeclare("city");
    expect(registry.version()).toBe(3);
  });

  it("does not bump the version when undeclaring an unknown field", () => {
    const registry = createFieldRegistry("Address");
    expect(registry.undeclare("missing")).toBe(false);
    expect(registry.version()).toBe(0);
  });

  it("throws UnknownFieldError from get()", () => {
    const registry = createFieldRegistry("Address");
    expect(() => registry.get("city")).toThrow(UnknownFieldError);
    expect(() => registry.get("city")).toThrow('Unknown field "city" on model Address');
    expect(registry.find("city")).toBeUndefined();
  });

  it("finds declarations by stored name", () => {
    const registry = createFieldRegistry("Address");
    registry.declare("postalCode", "string", { storedAs: "zip" });
    expect(registry.findByStoredName("zip")?.name).toBe("postalCode");
    expect(registry.findByStoredName("postalCode")).toBeUndefined();
  });

  it("drops wrappers together with the field", () => {
    const registry = createFieldRegistry("Address");
    registry.declare("city");
    registry.wrap("city", { read: (base) => base() });
    registry.undeclare("city");
    registry.declare("city");
    expect(registry.wrappersOf("city")).toEqual([]);
  });

  it("keeps wrappers across redeclaration", () => {
    const registry = createFieldRegistry("Address");
    const wrapper = { read: (base: () => unknown) => base() };
    registry.declare("city");
    registry.wrap("city", wrapper);
    registry.declare("city", "string", { default: "Chicago" });
    expect(registry.wrappersOf("city")).toEqual([wrapper]);
  });

  it("refuses to wrap an undeclared field", () => {
    const registry = createFieldRegistry("Address");
    expect(() => registry.wrap("city", {})).toThrow(UnknownFieldError);
  });
});

describe("declaration validation", () => {
  it("rejects serializers on non-serialized fields", () => {
    const registry = createFieldRegistry("Address");
    const serializer = { dump: (v: unknown) => v, load: (w: unknown) => w };
    expect(() => registry.declare("city", "string", { serializer })).toThrow(
      "Invalid declaration of Address.city: serializer: A serializer can only be given to serialized fields",
    );
  });

  it("rejects empty names", () => {
    const registry = createFieldRegistry("Address");
    expect(() => registry.declare("")).toThrow(ConfigError);
  });

  it("rejects a stored name already used by another field", () => {
    const registry = createFieldRegistry("Address");
    registry.declare("zip");
    try {
      registry.declare("postalCode", "string", { storedAs: "zip" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([
          { path: "storedAs", message: '"zip" is already used by field "zip"' },
        ]);
      }
    }
  });
});

describe("float deprecation", () => {
  it("warns once per process through the configured logger", () => {
    const logger = createSpyLogger();
    configure({ logger });
    const registry = createFieldRegistry("Reading");
    registry.declare("celsius", "float");
    registry.declare("fahrenheit", "float");
    createFieldRegistry("Other").declare("kelvin", "float");

    expect(logger.warn).toHaveBeenCalledOnce();
    expect(logger.warn).toHaveBeenCalledWith(
      'Field type "float" is deprecated; declare Reading.celsius as "number" instead',
      { deprecation: "float-field-type" },
    );
  });

  it("does not warn for number fields", () => {
    const logger = createSpyLogger();
    configure({ logger });
    createFieldRegistry("Reading").declare("celsius", "number");
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("snapshot()", () => {
  it("copies declarations under the child's name", () => {
    const parent = createFieldRegistry("Vehicle");
    parent.declare("wheels", "integer");
    const child = parent.snapshot("Car");
    expect(child.modelName).toBe("Car");
    expect(child.get("wheels").type).toBe("integer");
  });

  it("isolates later changes in both directions", () => {
    const parent = createFieldRegistry("Vehicle");
    parent.declare("wheels", "integer");
    const child = parent.snapshot("Car");

    parent.declare("color");
    child.declare("doors", "integer");
    parent.undeclare("wheels");

    expect(parent.fieldSet().map((f) => f.name)).toEqual(["color"]);
    expect(child.fieldSet().map((f) => f.name)).toEqual(["wheels", "doors"]);
  });

  it("copies wrappers", () => {
    const parent = createFieldRegistry("Vehicle");
    const wrapper = { read: (base: () => unknown) => base() };
    parent.declare("color");
    parent.wrap("color", wrapper);
    const child = parent.snapshot("Car");
    parent.undeclare("color");
    expect(child.wrappersOf("color")).toEqual([wrapper]);
  });
});
