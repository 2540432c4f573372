import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable when no prefix is set", async () => {
    const env = { HOSTMON_HUB_URL: "https://hub.example.test", PATH: "/usr/bin" }

    const result = await new EnvSource({ env }).load()

    expect(result).toEqual({ HOSTMON_HUB_URL: "https://hub.example.test", PATH: "/usr/bin" })
  })

  it("keeps full names when filtering by prefix", async () => {
    const env = {
      HOSTMON_HUB_URL: "https://hub.example.test",
      HOSTMON_HUB_USER: "agent",
      HOME: "/root",
    }

    const result = await new EnvSource({ env, prefix: "HOSTMON_" }).load()

    expect(result).toEqual({
      HOSTMON_HUB_URL: "https://hub.example.test",
      HOSTMON_HUB_USER: "agent",
    })
  })

  it("keeps variables set to an empty string", async () => {
    const result = await new EnvSource({ env: { HOSTMON_HUB_PASSWORD: "" }, prefix: "HOSTMON_" }).load()

    expect(result).toEqual({ HOSTMON_HUB_PASSWORD: "" })
  })

  it("drops variables without a value", async () => {
    const result = await new EnvSource({ env: { HOSTMON_HUB_USER: undefined, HOSTMON_HUB_URL: "u" } }).load()

    expect(result).toEqual({ HOSTMON_HUB_URL: "u" })
  })

  it("uses injected env over process.env", async () => {
    const result = await new EnvSource({ env: { CUSTOM: "injected" } }).load()

    expect(result).toEqual({ CUSTOM: "injected" })
    expect(result).not.toHaveProperty("PATH")
  })
})
