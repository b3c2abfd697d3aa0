import {
  diffSchemaObjects,
  normalizeExpression,
  type SchemaObject,
} from "./inspector.js"

describe("schema snapshots", () => {
  const users: SchemaObject = { kind: "table", name: "users" }
  const orders: SchemaObject = { kind: "table", name: "orders" }
  const trigger: SchemaObject = { kind: "trigger", name: "orders.decrease" }
  const view: SchemaObject = { kind: "view", name: "need_meeting" }

  it("should report added and removed objects sorted by kind then name", () => {
    const delta = diffSchemaObjects([users, view], [view, trigger, users, orders])

    expect(delta).toEqual({
      added: [orders, trigger],
      removed: [],
    })

    expect(diffSchemaObjects([view, users, orders], [orders])).toEqual({
      added: [],
      removed: [users, view],
    })
  })

  it("should treat objects of different kinds with the same name apart", () => {
    const index: SchemaObject = { kind: "index", name: "users" }

    expect(diffSchemaObjects([users], [index])).toEqual({
      added: [index],
      removed: [users],
    })
  })

  it("should report nothing for identical snapshots", () => {
    expect(diffSchemaObjects([users, view], [view, users])).toEqual({
      added: [],
      removed: [],
    })
  })
})

describe("expression normalization", () => {
  it("should ignore case, quoting and whitespace", () => {
    expect(normalizeExpression(`LEFT("Name", 1)`)).toBe("left(name,1)")
    expect(normalizeExpression("`score`")).toBe("score")
    expect(normalizeExpression(" left( name ,\n 1 ) ")).toBe("left(name,1)")
  })
})
