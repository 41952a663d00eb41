import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CriticAgent } from "../../src/agents/critic";
import { ScriptGenerator } from "../../src/agents/generator";
import type { GeneratedScript, RenderOutput } from "../../src/agents/types";
import type { SceneHost } from "../../src/pipeline/host";
import { type IterationRecord, mergeFeedback, RefinementLoop, shouldStopEarly } from "../../src/pipeline/loop";
import { FakeModelClient } from "../fake-client";

class FakeHost implements SceneHost {
	readonly scripts: GeneratedScript[] = [];

	constructor(private readonly render: () => RenderOutput) {}

	async run(script: GeneratedScript): Promise<RenderOutput> {
		this.scripts.push(script);
		return this.render();
	}
}

function scored(iteration: number, score: number): IterationRecord {
	return {
		iteration,
		critique: { verdict: "fail", score, feedback: "", issues: [], suggestions: [], iteration },
	};
}

describe("shouldStopEarly", () => {
	it("waits for three iterations", () => {
		expect(shouldStopEarly([{ iteration: 1, error: "x" }, { iteration: 2, error: "x" }])).toBeUndefined();
	});

	it("stops on the same error three times in a row", () => {
		const records = [1, 2, 3].map(iteration => ({ iteration, error: "NameError: bpy" }));
		expect(shouldStopEarly(records)).toBe("Same error repeated 3 times: NameError: bpy");
	});

	it("keeps going when the errors differ", () => {
		const records = ["a", "b", "a"].map((error, i) => ({ iteration: i + 1, error }));
		expect(shouldStopEarly(records)).toBeUndefined();
	});

	it("stops on strictly falling scores that end below 3", () => {
		expect(shouldStopEarly([scored(1, 6), scored(2, 4), scored(3, 2.5)])).toBe("Scores declining and below threshold");
	});

	it("keeps going when the decline ends at 3 or the scores are not strictly falling", () => {
		expect(shouldStopEarly([scored(1, 6), scored(2, 4), scored(3, 3)])).toBeUndefined();
		expect(shouldStopEarly([scored(1, 2), scored(2, 2), scored(3, 1)])).toBeUndefined();
	});

	it("only looks at the last three iterations", () => {
		expect(shouldStopEarly([scored(1, 9), scored(2, 5), scored(3, 5), scored(4, 1)])).toBeUndefined();
	});
});

describe("mergeFeedback", () => {
	it("appends issues and suggestions as bullet lists", () => {
		expect(
			mergeFeedback({
				verdict: "fail",
				score: 4,
				feedback: "Chair is floating",
				issues: ["legs missing", "no floor"],
				suggestions: ["add four legs"],
				iteration: 1,
			}),
		).toBe("Chair is floating\n\nKey Issues:\n  - legs missing\n  - no floor\n\nSuggestions:\n  - add four legs");
	});

	it("returns the bare feedback when there is nothing to append", () => {
		expect(
			mergeFeedback({ verdict: "fail", score: 4, feedback: "Too dark", issues: [], suggestions: [], iteration: 1 }),
		).toBe("Too dark");
	});
});

describe("RefinementLoop", () => {
	let tempDir: string;
	let renderPath: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "scene-forge-loop-"));
		renderPath = path.join(tempDir, "grid.png");
		fs.writeFileSync(renderPath, "fake-png");
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	function createLoop(generatorResponses: Array<string | Error>, criticResponses: string[], maxRetries: number) {
		const generatorClient = new FakeModelClient(generatorResponses);
		const criticClient = new FakeModelClient(criticResponses);
		const host = new FakeHost(() => ({ imagePaths: [renderPath] }));
		const loop = new RefinementLoop({
			generator: new ScriptGenerator(generatorClient, { template: "{feedback}", refineTemplate: null }),
			critic: new CriticAgent(criticClient),
			host,
			maxRetries,
		});
		return { loop, host, generatorClient, criticClient };
	}

	it("refines with the merged critique and succeeds on iteration 2", async () => {
		const { loop, host, generatorClient } = createLoop(
			["import bpy  # v1", "import bpy  # v2"],
			['{"verdict": "fail", "score": 4, "feedback": "too small", "issues": ["tiny"]}', '{"verdict": "pass", "score": 8}'],
			5,
		);

		const result = await loop.run("a large cube", {});

		expect(result.status).toBe("success");
		expect(result.iterations).toHaveLength(2);
		expect(result.best?.iteration).toBe(2);
		expect(host.scripts.map(script => script.code)).toEqual(["import bpy  # v1", "import bpy  # v2"]);
		expect(generatorClient.generateCalls[1].prompt).toContain("Critic feedback:\ntoo small\n\nKey Issues:\n  - tiny");
	});

	it("stops at maxRetries and reports the best-scoring iteration", async () => {
		const { loop } = createLoop(
			["import bpy", "import bpy", "import bpy"],
			['{"score": 5}', '{"score": 6}', '{"score": 4}'],
			3,
		);

		const result = await loop.run("a cube", {});

		expect(result.status).toBe("max-retries");
		expect(result.iterations).toHaveLength(3);
		expect(result.best?.iteration).toBe(2);
		expect(result.reason).toBeUndefined();
	});

	it("stops early after three identical failures", async () => {
		const { loop, criticClient } = createLoop(
			[new Error("quota exceeded"), new Error("quota exceeded"), new Error("quota exceeded")],
			[],
			5,
		);

		const result = await loop.run("a cube", {});

		expect(result.status).toBe("failed");
		expect(result.iterations.map(record => record.error)).toEqual(["quota exceeded", "quota exceeded", "quota exceeded"]);
		expect(result.reason).toBe("Same error repeated 3 times: quota exceeded");
		expect(criticClient.imageCalls).toHaveLength(0);
	});

	it("stops early when scores keep falling", async () => {
		const { loop } = createLoop(
			["import bpy", "import bpy", "import bpy"],
			['{"score": 6}', '{"score": 4}', '{"score": 2}'],
			5,
		);

		const result = await loop.run("a cube", {});

		expect(result.status).toBe("failed");
		expect(result.iterations).toHaveLength(3);
		expect(result.reason).toBe("Scores declining and below threshold");
		expect(result.best?.iteration).toBe(1);
	});

	it("passes reference images to the critic after the render", async () => {
		const referencePath = path.join(tempDir, "reference.jpg");
		fs.writeFileSync(referencePath, "fake-jpg");
		const { loop, criticClient } = createLoop(["import bpy"], ['{"verdict": "pass", "score": 9}'], 1);

		await loop.run("a cube", {}, [referencePath]);

		expect(criticClient.imageCalls[0].imagePaths).toEqual([renderPath, referencePath]);
	});

	it("reports each iteration as it completes", async () => {
		const generatorClient = new FakeModelClient(["import bpy"]);
		const seen: number[] = [];
		const loop = new RefinementLoop({
			generator: new ScriptGenerator(generatorClient),
			critic: new CriticAgent(new FakeModelClient([])),
			host: new FakeHost(() => ({ imagePaths: [], hostError: "Traceback" })),
			maxRetries: 1,
			onIteration: record => seen.push(record.critique?.score ?? -1),
		});

		const result = await loop.run("a cube", {});

		expect(seen).toEqual([0]);
		expect(result.status).toBe("max-retries");
		expect(result.best).toBeUndefined();
	});
});
