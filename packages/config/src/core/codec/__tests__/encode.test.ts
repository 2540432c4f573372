import { z } from "zod"

import { jsonLineCodec } from "../../__tests__/json-line-codec"
import { createDefaultMinValuableConfig } from "../../defaults/defaults"
import { minValuableSchema } from "../../schema/agent-config.schema"
import { descriptorsFor } from "../../schema/descriptor"
import { encodeConfig } from "../encode"

type Sample = {
  mode: string
  token: string
  extra: string
  checks: { enabled: boolean; interval: number }
}

const d = descriptorsFor<Sample>()
const checks = descriptorsFor<Sample["checks"]>()

const sampleSchema = [
  d.field("mode", "mode", z.string(), { comment: "run mode\n\nsee docs" }),
  d.table("checks", "checks", [checks.field("enabled", "enabled", z.boolean()), checks.field("interval", "interval", z.number())], {
    comment: "periodic checks",
  }),
  d.field("token", "token", z.string(), { commented: true }),
  d.field("extra", "extra", z.string(), { omitEmpty: true }),
]

describe("encodeConfig", () => {
  it("writes top-level keys before table sections", () => {
    const text = encodeConfig(
      sampleSchema,
      { mode: "full", token: "test-secret", extra: "x", checks: { enabled: true, interval: 60 } },
      jsonLineCodec,
    )

    expect(text).toBe(
      [
        "# run mode",
        "#",
        "# see docs",
        'mode = "full"',
        'token = "test-secret"',
        'extra = "x"',
        "",
        "# periodic checks",
        "[checks]",
        "enabled = true",
        "interval = 60",
        "",
      ].join("\n"),
    )
  })

  it("comments out empty commented keys and skips empty omit-empty keys", () => {
    const text = encodeConfig(
      sampleSchema,
      { mode: "full", token: "", extra: "", checks: { enabled: false, interval: 0 } },
      jsonLineCodec,
    )

    expect(text.split("\n")).toContain('# token = ""')
    expect(text).not.toContain("extra")
    expect(text.split("\n")).toContain("enabled = false")
  })

  it("renders the minimal config", () => {
    const text = encodeConfig(minValuableSchema, createDefaultMinValuableConfig(), jsonLineCodec)

    expect(text).toBe(
      [
        '# "debug", "info", "warning" or "error"; can be overridden with --log-level',
        'log_level = "error"',
        'io_mode = "http"',
        '# hub_url = ""',
        '# hub_user = ""',
        '# hub_password = ""',
        "",
      ].join("\n"),
    )
  })
})
