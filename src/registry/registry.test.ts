import { describe, it, expect, beforeEach, vi } from "vitest"
import { z } from "../schema"
import { ShadowRegistry } from "./registry"
import { UnresolvedRenameError, UnsupportedTypeError } from "@/errors"

describe("ShadowRegistry", () => {
  let registry: ShadowRegistry

  beforeEach(() => {
    registry = new ShadowRegistry()
  })

  describe("add()", () => {
    it("should add a schema with metadata", () => {
      const schema = z.object({ port: z.number() })

      registry.add(schema, { name: "server", description: "Server settings" })

      expect(registry.has("server")).toBe(true)
      expect(registry.has("Server")).toBe(true)
      expect(registry.size).toBe(1)
    })

    it("should throw if metadata has no name", () => {
      expect(() => registry.add(z.object({}), { name: "" })).toThrow("Struct metadata must include a name")
    })

    it("should support method chaining", () => {
      const result = registry.add(z.object({}), { name: "a" }).add(z.object({}), { name: "b" })

      expect(result).toBe(registry)
      expect(registry.size).toBe(2)
    })

    it("should normalize struct and target names", () => {
      registry.add(z.object({}), { name: "server-config", target: "server_layer" })

      expect(registry.getMeta("server-config")).toEqual({ name: "ServerConfig", target: "ServerLayer" })
    })

    it("should replace a struct registered under the same name", () => {
      const first = z.object({ a: z.string() })
      const second = z.object({ b: z.string() })

      registry.add(first, { name: "foo" }).add(second, { name: "foo" })

      expect(registry.size).toBe(1)
      expect(registry.getSchema("foo")).toBe(second)
      expect(registry.hasSchema(first)).toBe(false)
    })
  })

  describe("lookups", () => {
    it("should find schemas and their clones", () => {
      const schema = z.object({ port: z.number() })
      registry.add(schema, { name: "server" })

      expect(registry.getSchema("server")).toBe(schema)
      expect(registry.getNameForSchema(schema)).toBe("Server")
      expect(registry.getNameForSchema(schema.describe("A server"))).toBe("Server")
      expect(registry.getNameForSchema(z.object({ port: z.number() }))).toBeUndefined()
    })

    it("should return undefined for unknown names", () => {
      expect(registry.get("missing")).toBeUndefined()
      expect(registry.getMeta("missing")).toBeUndefined()
    })
  })

  describe("remove() / clear()", () => {
    it("should remove a struct by name", () => {
      const schema = z.object({})
      registry.add(schema, { name: "foo" })

      expect(registry.remove("foo")).toBe(true)
      expect(registry.has("foo")).toBe(false)
      expect(registry.hasSchema(schema)).toBe(false)
      expect(registry.remove("foo")).toBe(false)
    })

    it("should clear all structs", () => {
      registry.add(z.object({}), { name: "a" }).add(z.object({}), { name: "b" })
      registry.clear()

      expect(registry.size).toBe(0)
    })
  })

  describe("iterators", () => {
    beforeEach(() => {
      registry.add(z.object({}), { name: "icon" })
      registry.add(z.object({}), { name: "text" })
    })

    it("values() should yield entries in registration order", () => {
      expect(Array.from(registry.values(), (e) => e.meta.name)).toEqual(["Icon", "Text"])
    })

    it("entries() should yield [name, entry] pairs", () => {
      expect(Array.from(registry.entries(), ([name]) => name)).toEqual(["Icon", "Text"])
    })

    it("names() should yield struct names", () => {
      expect(Array.from(registry.names())).toEqual(["Icon", "Text"])
    })
  })

  describe("toStructSchemas()", () => {
    it("should reference other registered structs by name", () => {
      const Server = z.object({ port: z.number() })
      registry.add(z.object({ server: Server }), { name: "app" }).add(Server, { name: "server" })

      const [app] = registry.toStructSchemas()

      expect(app.fields[0].type).toEqual({ kind: "named", name: "Server" })
    })
  })

  describe("generate()", () => {
    const logger = { warn: vi.fn(), error: vi.fn() }

    it("should generate the documented Foo example", () => {
      registry.add(z.object({ meow: z.number(), woof: z.string() }), { name: "Foo" })
      const shadows = registry.generate({ logger })
      const target = { meow: 4, woof: "I am hungry rn" }

      shadows.apply("Foo", { meow: 10, woof: undefined }, target)

      expect(shadows.require("Foo").name).toBe("OptionalFoo")
      expect(target).toEqual({ meow: 10, woof: "I am hungry rn" })
    })

    it("should validate shadow values against the generated schema", () => {
      const Server = z.object({ host: z.string(), port: z.number().default(80) })
      registry.add(Server, { name: "server" }).add(z.object({ name: z.string().skipWrap(), server: Server }), { name: "app" })
      const app = registry.generate({ logger }).require("App")

      expect(app.parse({ name: "api", server: { port: 8080 } })).toEqual({ name: "api", server: { port: 8080 } })
      expect(app.parse({ name: "api", server: {} })).toEqual({ name: "api", server: {} })
      expect(() => app.parse({ server: {} })).toThrow()
      expect(() => app.parse({ name: "api", server: { port: "80" } })).toThrow()
      expect(() => app.parse({ name: "api", typo: true })).toThrow()
    })

    it("should fail generation on an unresolved rename", () => {
      registry.add(z.object({ db: z.object({ url: z.string() }).rename("Database") }), { name: "app" })

      expect(() => registry.generate({ logger })).toThrow(UnresolvedRenameError)
    })

    it("should fail generation when a renamed field is not a struct", () => {
      const Server = z.object({ port: z.number() })
      registry.add(Server, { name: "server" }).add(z.object({ list: z.array(Server).rename("Server") }), { name: "app" })

      expect(() => registry.generate({ logger })).toThrow(UnsupportedTypeError)
      expect(() => registry.generate({ logger })).toThrow('App.list: unsupported declared type "Server[]"')

      registry.add(z.object({ backup: Server.nullable().rename("Server") }), { name: "app" })

      expect(() => registry.generate({ logger })).toThrow('App.backup: unsupported declared type "Server | null"')
    })
  })

  describe("toTypescript()", () => {
    it("should render shadows without original types", () => {
      registry.add(z.object({ port: z.number().skipWrap() }), { name: "server", defaultWrap: false })

      expect(registry.toTypescript({ includeOriginals: false, exportTypes: false })).toBe(`/**
 * Optional overlay of Server.
 * @capabilities equals, clone, debug
 */
type OptionalServer = {
  port: number
}

function applyOptionalServer(shadow: OptionalServer, target: Server): void {
  target.port = shadow.port
}`)
    })
  })
})
