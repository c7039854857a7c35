import { describe, it, expect } from "vitest"
import { CachedSchemaProvider, levenshtein, nameSimilarity, rankSimilarNames } from "./schema_provider.js"
import { FixtureSchemaSource } from "./test_support.js"

const TABLES = ["patients", "admissions", "wards", "departments", "visits"]

describe("levenshtein", () => {
	it("counts single-character edits", () => {
		expect(levenshtein("kitten", "sitting")).toBe(3)
		expect(levenshtein("", "abc")).toBe(3)
		expect(levenshtein("same", "same")).toBe(0)
	})
})

describe("nameSimilarity", () => {
	it("boosts prefixes to at least 0.8", () => {
		expect(nameSimilarity("ward", "wards")).toBe(0.8)
		expect(nameSimilarity("patient", "patients")).toBe(0.875)
	})

	it("ignores case", () => {
		expect(nameSimilarity("Visits", "visits")).toBe(1)
	})
})

describe("rankSimilarNames", () => {
	it("returns the closest three names", () => {
		expect(rankSimilarNames("patient", TABLES)).toEqual(["patients", "departments", "admissions"])
		expect(rankSimilarNames("admision", TABLES)).toEqual(["admissions", "visits", "patients"])
	})

	it("never suggests the name itself", () => {
		expect(rankSimilarNames("wards", TABLES)).not.toContain("wards")
	})

	it("puts preferred names first", () => {
		expect(rankSimilarNames("foo", TABLES)).toEqual(["admissions", "departments", "patients"])
		expect(rankSimilarNames("foo", TABLES, { preferred: ["patients", "admissions"] })).toEqual([
			"admissions",
			"patients",
			"departments",
		])
	})

	it("honours the limit", () => {
		expect(rankSimilarNames("ward", TABLES, { limit: 1 })).toEqual(["wards"])
	})
})

describe("CachedSchemaProvider", () => {
	function setup(options = { ttlMs: 10_000, versionCheckMs: 1_000 }) {
		let now = 0
		const source = new FixtureSchemaSource()
		const provider = new CachedSchemaProvider(source, options, undefined, () => now)
		return {
			source,
			provider,
			advance: (ms: number) => {
				now += ms
			},
		}
	}

	it("loads once and serves the cached snapshot", async () => {
		const { source, provider } = setup()
		const [a, b] = await Promise.all([provider.snapshot(), provider.snapshot()])
		expect(a).toBe(b)
		expect(await provider.tableExists("Patients")).toBe(true)
		expect(await provider.tableExists("clinics")).toBe(false)
		expect(source.snapshotLoads).toBe(1)
		expect(source.versionLoads).toBe(0)
	})

	it("probes the version at most once per interval", async () => {
		const { source, provider, advance } = setup()
		await provider.snapshot()
		advance(999)
		await provider.snapshot()
		expect(source.versionLoads).toBe(0)
		advance(1)
		await provider.snapshot()
		expect(source.versionLoads).toBe(1)
		expect(source.snapshotLoads).toBe(1)
	})

	it("reloads when the version changes", async () => {
		const { source, provider, advance } = setup()
		expect(await provider.schemaVersion()).toBe("v1")
		source.version = "v2"
		advance(1_000)
		expect(await provider.schemaVersion()).toBe("v2")
		expect(source.snapshotLoads).toBe(2)
	})

	it("reloads after the ttl", async () => {
		const { source, provider, advance } = setup()
		await provider.snapshot()
		advance(10_000)
		await provider.snapshot()
		expect(source.snapshotLoads).toBe(2)
	})

	it("suggests similar tables from the snapshot", async () => {
		const { provider } = setup()
		expect(await provider.suggestSimilar("ward")).toEqual(["wards", "departments", "patients"])
	})
})
