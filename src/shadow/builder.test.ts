import { describe, it, expect, vi } from "vitest"
import { buildShadowType, toRepresentation } from "./builder"
import { buildTypeRegistry } from "./type-registry"
import { defineStruct } from "./generate"
import { UnsupportedTypeError, UnresolvedRenameError } from "@/errors"
import type { TypeRef } from "./types"

const number: TypeRef = { kind: "primitive", name: "number" }
const string: TypeRef = { kind: "primitive", name: "string" }
const server: TypeRef = { kind: "named", name: "Server" }

const Server = defineStruct({ name: "Server", fields: [{ name: "port", type: number }] })

describe("toRepresentation()", () => {
  it("should map every wrap decision and nesting combination", () => {
    expect(toRepresentation("raw", number, undefined)).toEqual({ kind: "raw", type: number })
    expect(toRepresentation("wrapped", number, undefined)).toEqual({ kind: "wrapped", type: number })
    expect(toRepresentation("raw", server, "OptionalServer")).toEqual({ kind: "nested", shadow: "OptionalServer" })
    expect(toRepresentation("wrapped", server, "OptionalServer")).toEqual({ kind: "wrapped-nested", shadow: "OptionalServer" })
  })
})

describe("buildShadowType()", () => {
  it("should wrap every field of a default struct", () => {
    const Foo = defineStruct({
      name: "Foo",
      fields: [
        { name: "meow", type: number },
        { name: "woof", type: string },
      ],
    })

    const definition = buildShadowType(Foo, buildTypeRegistry([Foo]))

    expect(definition).toEqual({
      name: "OptionalFoo",
      original: "Foo",
      fields: [
        { name: "meow", representation: { kind: "wrapped", type: number } },
        { name: "woof", representation: { kind: "wrapped", type: string } },
      ],
      capabilities: ["equals", "clone", "debug"],
    })
  })

  it("should nest registered struct types and keep presence wrapping rules", () => {
    const App = defineStruct({
      name: "App",
      fields: [
        { name: "primary", type: server },
        { name: "fallback", type: server, directive: "force-raw" },
      ],
    })

    const definition = buildShadowType(App, buildTypeRegistry([Server, App]))

    expect(definition.fields.map((f) => f.representation)).toEqual([
      { kind: "wrapped-nested", shadow: "OptionalServer" },
      { kind: "nested", shadow: "OptionalServer" },
    ])
  })

  it("should keep an optional struct field raw unless renamed", () => {
    const optionalServer: TypeRef = { kind: "optional", inner: server }
    const App = defineStruct({
      name: "App",
      fields: [
        { name: "plain", type: optionalServer },
        { name: "renamed", type: optionalServer, rename: "Server" },
      ],
    })

    const definition = buildShadowType(App, buildTypeRegistry([Server, App]))

    expect(definition.fields.map((f) => f.representation)).toEqual([
      { kind: "raw", type: optionalServer },
      { kind: "nested", shadow: "OptionalServer" },
    ])
  })

  it("should append caller capabilities after the baseline without duplicates", () => {
    const Foo = defineStruct({ name: "Foo", fields: [], capabilities: ["serialize", "clone", "hash"] })

    expect(buildShadowType(Foo, buildTypeRegistry([Foo])).capabilities).toEqual(["equals", "clone", "debug", "serialize", "hash"])
  })

  it("should use a custom baseline when given", () => {
    const Foo = defineStruct({ name: "Foo", fields: [], capabilities: ["serialize"] })

    expect(buildShadowType(Foo, buildTypeRegistry([Foo]), { baseline: ["clone"] }).capabilities).toEqual(["clone", "serialize"])
  })

  it("should carry descriptions through", () => {
    const Foo = defineStruct({ name: "Foo", description: "Foo settings", fields: [{ name: "meow", type: number, description: "Meow count" }] })

    const definition = buildShadowType(Foo, buildTypeRegistry([Foo]))

    expect(definition.description).toBe("Foo settings")
    expect(definition.fields[0].description).toBe("Meow count")
  })

  it("should fail on an unresolved rename", () => {
    const App = defineStruct({ name: "App", fields: [{ name: "db", type: string, rename: "Database" }] })

    expect(() => buildShadowType(App, buildTypeRegistry([App]))).toThrow(UnresolvedRenameError)
  })

  it("should reject a rename on a declared type that is not a struct", () => {
    const Nullable = defineStruct({ name: "A", fields: [{ name: "backup", type: { kind: "nullable", inner: server }, rename: "Server" }] })
    const List = defineStruct({ name: "B", fields: [{ name: "list", type: { kind: "array", element: server }, rename: "Server" }] })
    const Scalar = defineStruct({ name: "C", fields: [{ name: "port", type: { kind: "optional", inner: number }, rename: "Server" }] })
    const logger = { warn: vi.fn(), error: vi.fn() }

    expect(() => buildShadowType(Nullable, buildTypeRegistry([Server, Nullable]), { logger })).toThrow('A.backup: unsupported declared type "Server | null"')
    expect(() => buildShadowType(List, buildTypeRegistry([Server, List]))).toThrow('B.list: unsupported declared type "Server[]"')
    expect(() => buildShadowType(Scalar, buildTypeRegistry([Server, Scalar]))).toThrow('C.port: unsupported declared type "number | undefined"')
    expect(logger.error).toHaveBeenCalledWith("[Shadow] Renamed field is not a struct:", 'A.backup: unsupported declared type "Server | null"')
  })

  it("should accept a rename on an optional or inline struct type", () => {
    const App = defineStruct({
      name: "App",
      fields: [
        { name: "backup", type: { kind: "optional", inner: server }, rename: "Server" },
        { name: "inline", type: { kind: "object", fields: [{ name: "port", type: number }] }, rename: "Server" },
      ],
    })

    const definition = buildShadowType(App, buildTypeRegistry([Server, App]))

    expect(definition.fields.map((f) => f.representation)).toEqual([
      { kind: "nested", shadow: "OptionalServer" },
      { kind: "wrapped-nested", shadow: "OptionalServer" },
    ])
  })

  it("should reject types whose optional-ness is ambiguous", () => {
    const undefinedField = defineStruct({ name: "A", fields: [{ name: "nothing", type: { kind: "primitive", name: "undefined" } }] })
    const doubleOptional = defineStruct({
      name: "B",
      fields: [{ name: "twice", type: { kind: "optional", inner: { kind: "optional", inner: number } } }],
    })
    const undefinedUnion = defineStruct({
      name: "C",
      fields: [{ name: "either", type: { kind: "union", options: [number, { kind: "primitive", name: "undefined" }] } }],
    })

    expect(() => buildShadowType(undefinedField, buildTypeRegistry([undefinedField]))).toThrow(UnsupportedTypeError)
    expect(() => buildShadowType(doubleOptional, buildTypeRegistry([doubleOptional]))).toThrow('B.twice: unsupported declared type "number | undefined | undefined"')
    expect(() => buildShadowType(undefinedUnion, buildTypeRegistry([undefinedUnion]))).toThrow('C.either: unsupported declared type "number | undefined"')
  })

  it("should accept optional elements inside containers", () => {
    const Foo = defineStruct({
      name: "Foo",
      fields: [{ name: "list", type: { kind: "array", element: { kind: "optional", inner: number } } }],
    })

    expect(() => buildShadowType(Foo, buildTypeRegistry([Foo]))).not.toThrow()
  })

  it("should warn when a rename points at a different struct than the declared type", () => {
    const Other = defineStruct({ name: "Other", fields: [] })
    const App = defineStruct({ name: "App", fields: [{ name: "server", type: server, rename: "Other" }] })
    const logger = { warn: vi.fn(), error: vi.fn() }

    const definition = buildShadowType(App, buildTypeRegistry([Server, Other, App]), { logger })

    expect(definition.fields[0].representation).toEqual({ kind: "wrapped-nested", shadow: "OptionalOther" })
    expect(logger.warn).toHaveBeenCalledWith('[Shadow] App.server: rename target "Other" shadows "Other", declared type is "Server"')
  })
})
