import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("skips undefined entries", async () => {
    const source = new EnvSource({ env: { A: "1", B: undefined } })

    expect(await source.load()).toEqual({ A: "1" })
  })

  it("filters by prefix and strips it", async () => {
    const source = new EnvSource({
      prefix: "HEARTH_",
      env: { HEARTH_CACHE_TTL_SECONDS: "60", PATH: "/usr/bin" },
    })

    expect(await source.load()).toEqual({ CACHE_TTL_SECONDS: "60" })
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("HEARTH_ENV_SOURCE_TEST", "yes")

    const values = await new EnvSource().load()

    expect(values["HEARTH_ENV_SOURCE_TEST"]).toBe("yes")
    vi.unstubAllEnvs()
  })
})
