import { CodecError } from "../errors"
import { JsonCodec } from "./json"
import { YamlCodec } from "./yaml"

describe("JSON codec", () => {
  it("Should write rows in column order", () => {
    expect(
      JsonCodec.serialize(
        {
          columns: ["id", "name", "at"],
          rows: [
            {
              at: new Date("2024-01-02T03:04:05.000Z"),
              name: "Ada",
              id: 1,
            },
          ],
        },
        {},
      ),
    ).toBe('[{"id":1,"name":"Ada","at":"2024-01-02T03:04:05.000Z"}]')
  })

  it("Should indent when asked", () => {
    expect(
      JsonCodec.serialize({ columns: ["a"], rows: [{ a: null }] }, { indent: 2 }),
    ).toBe('[\n  {\n    "a": null\n  }\n]')
  })

  it("Should refuse non-finite numbers", () => {
    expect(() =>
      JsonCodec.serialize(
        { columns: ["n"], rows: [{ n: 1 }, { n: Number.POSITIVE_INFINITY }] },
        {},
      ),
    ).toThrow(new CodecError("Row 1 has a non-finite number in n"))
  })

  it("Should read an array of flat objects", () => {
    expect(JsonCodec.deserialize?.('[{"a":1,"b":"x"},{"c":true}]', {})).toEqual(
      {
        columns: ["a", "b", "c"],
        rows: [{ a: 1, b: "x" }, { c: true }],
      },
    )
  })

  it("Should refuse other documents", () => {
    expect(() => JsonCodec.deserialize?.('{"a":1}', {})).toThrow(
      "Expected an array of rows",
    )
    expect(() => JsonCodec.deserialize?.('[{"a":1},[2]]', {})).toThrow(
      "Row 1 is not an object",
    )
    expect(() => JsonCodec.deserialize?.('[{"a":{"b":1}}]', {})).toThrow(
      "Row 0 has a nested value in a",
    )
    expect(() => JsonCodec.deserialize?.("[{", {})).toThrow(CodecError)
  })

  it("Should only detect objects and arrays", () => {
    expect(JsonCodec.detect?.('{"a":1}')).toBeTruthy()
    expect(JsonCodec.detect?.("[]")).toBeTruthy()
    expect(JsonCodec.detect?.("12")).toBeFalsy()
    expect(JsonCodec.detect?.("a,b")).toBeFalsy()
  })
})

describe("YAML codec", () => {
  it("Should write a block sequence", () => {
    expect(
      YamlCodec.serialize(
        {
          columns: ["name", "age", "active", "note"],
          rows: [{ name: "Ada", age: 36, active: true, note: null }],
        },
        {},
      ),
    ).toBe("- name: Ada\n  age: 36\n  active: true\n  note: null\n")
  })

  it("Should read mappings with the core schema only", () => {
    expect(
      YamlCodec.deserialize?.("- a: 1\n  b: x\n- d: 2024-01-02\n", {}),
    ).toEqual({
      columns: ["a", "b", "d"],
      rows: [{ a: 1, b: "x" }, { d: "2024-01-02" }],
    })
    expect(YamlCodec.deserialize?.("", {})).toEqual({ columns: [], rows: [] })
  })

  it("Should refuse nested values", () => {
    expect(() => YamlCodec.deserialize?.("- a:\n    b: 1\n", {})).toThrow(
      "Row 0 has a nested value in a",
    )
    expect(() => YamlCodec.deserialize?.("- a: [1\n", {})).toThrow(CodecError)
  })

  it("Should only detect collections", () => {
    expect(YamlCodec.detect?.("- a: 1\n")).toBeTruthy()
    expect(YamlCodec.detect?.("plain words")).toBeFalsy()
  })
})
