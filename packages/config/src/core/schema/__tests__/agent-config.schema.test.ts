import { linuxHost, windowsHost } from "../../__tests__/helpers"
import { createDefaultConfig, createDefaultMinValuableConfig } from "../../defaults/defaults"
import { agentConfigSchema, minValuableSchema } from "../agent-config.schema"
import { bindAll, type BoundEntry, type BoundField } from "../descriptor"

function commentedFields(entries: readonly BoundEntry[]): BoundField[] {
  return entries.flatMap((entry) => (entry.kind === "field" ? [entry] : entry.fields)).filter((f) => f.options.commented)
}

describe("agent config descriptors", () => {
  it.each([
    ["linux", linuxHost],
    ["windows", windowsHost],
  ])("flags as commented only fields that start out empty on %s", (_name, host) => {
    const fields = commentedFields(bindAll(agentConfigSchema, createDefaultConfig(host)))

    expect(fields.map((f) => f.key)).toEqual([
      "hub_url",
      "hub_user",
      "hub_password",
      "hub_proxy",
      "hub_proxy_user",
      "hub_proxy_password",
      "net_interface_exclude",
    ])
    for (const field of fields) expect([[], ""]).toContainEqual(field.read())
  })

  it("agrees with the bootstrap table on the shared keys", () => {
    const bootstrap = commentedFields(bindAll(minValuableSchema, createDefaultMinValuableConfig())).map((f) => f.key)

    expect(bootstrap).toEqual(["hub_url", "hub_user", "hub_password"])
  })
})
