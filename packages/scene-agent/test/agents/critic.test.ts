import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CriticAgent, computeVerdict, parseCritique } from "../../src/agents/critic";
import { FakeModelClient } from "../fake-client";

describe("computeVerdict", () => {
	it("passes on score alone under the score policy", () => {
		expect(computeVerdict("fail", 8, 7, "score")).toBe("pass");
		expect(computeVerdict("pass", 6.5, 7, "score")).toBe("fail");
	});

	it("needs both the model verdict and the score under the strict policy", () => {
		expect(computeVerdict("fail", 8, 7, "strict")).toBe("fail");
		expect(computeVerdict("pass", 8, 7, "strict")).toBe("pass");
		expect(computeVerdict("pass", 6, 7, "strict")).toBe("fail");
	});

	it("treats the threshold itself as passing", () => {
		expect(computeVerdict("pass", 7, 7)).toBe("pass");
	});
});

describe("parseCritique", () => {
	it("parses a fenced JSON critique", () => {
		const response = `Here is my review:
\`\`\`json
{"verdict": "pass", "score": 8.5, "feedback": "Looks right", "issues": [], "suggestions": ["Add a floor"]}
\`\`\``;
		expect(parseCritique(response, 2)).toEqual({
			verdict: "pass",
			score: 8.5,
			feedback: "Looks right",
			issues: [],
			suggestions: ["Add a floor"],
			iteration: 2,
		});
	});

	it("finds a bare object in prose and repairs trailing commas", () => {
		const result = parseCritique('Verdict follows {"verdict": "fail", "score": 3, "issues": ["no legs",],} done', 1);
		expect(result.verdict).toBe("fail");
		expect(result.score).toBe(3);
		expect(result.issues).toEqual(["no legs"]);
		expect(result.feedback).toBe("No feedback provided");
	});

	it("clamps the score and defaults non-numeric scores to 5", () => {
		expect(parseCritique('{"score": 14}', 1).score).toBe(10);
		expect(parseCritique('{"score": -2}', 1).score).toBe(0);
		expect(parseCritique('{"score": "high"}', 1).score).toBe(5);
		expect(parseCritique('{"score": "8"}', 1).score).toBe(8);
		expect(parseCritique('{"verdict": "pass"}', 1).score).toBe(5);
	});

	it("wraps scalar issues and suggestions in lists", () => {
		const result = parseCritique('{"score": 4, "issues": "too dark", "suggestions": ""}', 1);
		expect(result.issues).toEqual(["too dark"]);
		expect(result.suggestions).toEqual([]);
	});

	it("applies the configured threshold and policy", () => {
		expect(parseCritique('{"verdict": "fail", "score": 6}', 1, { passThreshold: 5 }).verdict).toBe("pass");
		expect(parseCritique('{"verdict": "fail", "score": 6}', 1, { passThreshold: 5, policy: "strict" }).verdict).toBe(
			"fail",
		);
	});

	it("falls back to a failing result quoting the raw text", () => {
		const raw = "The model is mostly fine but the table has three legs.";
		expect(parseCritique(raw, 3)).toEqual({
			verdict: "fail",
			score: 5,
			feedback: `Model provided feedback but in wrong format. Raw response: ${raw}`,
			issues: ["Critique parsing failed"],
			suggestions: ["Continue iterating based on the raw feedback above"],
			iteration: 3,
		});
	});

	it("quotes at most 800 characters of an unparseable response", () => {
		const raw = "x".repeat(1000);
		const { feedback } = parseCritique(raw, 1);
		expect(feedback).toBe(`Model provided feedback but in wrong format. Raw response: ${"x".repeat(800)}`);
	});
});

describe("CriticAgent", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "scene-forge-critic-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("fails immediately when the script errored in the host", async () => {
		const client = new FakeModelClient([]);
		const critic = new CriticAgent(client);

		const result = await critic.critique({ imagePaths: [], hostError: "NameError: bpy" }, "a chair", {}, 1);

		expect(result.verdict).toBe("fail");
		expect(result.score).toBe(0);
		expect(result.feedback).toBe("Blender script failed with error:\nNameError: bpy");
		expect(client.imageCalls).toHaveLength(0);
	});

	it("fails when no render image exists", async () => {
		const client = new FakeModelClient([]);
		const critic = new CriticAgent(client);

		const result = await critic.critique({ imagePaths: [path.join(tempDir, "missing.png")] }, "a chair", {}, 1);

		expect(result.score).toBe(0);
		expect(result.issues).toEqual(["No render output"]);
		expect(client.imageCalls).toHaveLength(0);
	});

	it("sends existing images with the filled template and parses the answer", async () => {
		const imagePath = path.join(tempDir, "grid.png");
		fs.writeFileSync(imagePath, "fake-png");
		const client = new FakeModelClient(['{"verdict": "pass", "score": 9, "feedback": "Great"}']);
		const critic = new CriticAgent(client, { template: "Prompt: {user_prompt}\nScene: {scene_description}" });

		const result = await critic.critique({ imagePaths: [imagePath] }, "a chair", { objects: ["chair"] }, 4);

		expect(client.imageCalls).toEqual([
			{
				imagePaths: [imagePath],
				prompt: 'Prompt: a chair\nScene: {\n  "objects": [\n    "chair"\n  ]\n}',
			},
		]);
		expect(result).toEqual({
			verdict: "pass",
			score: 9,
			feedback: "Great",
			issues: [],
			suggestions: [],
			iteration: 4,
		});
	});

	it("appends existing reference images after the renders", async () => {
		const renderPath = path.join(tempDir, "grid.png");
		const referencePath = path.join(tempDir, "reference.png");
		fs.writeFileSync(renderPath, "fake-png");
		fs.writeFileSync(referencePath, "fake-png");
		const client = new FakeModelClient(['{"verdict": "pass", "score": 8}']);
		const critic = new CriticAgent(client);

		await critic.critique({ imagePaths: [renderPath] }, "a chair", {}, 1, [
			path.join(tempDir, "missing.png"),
			referencePath,
		]);

		expect(client.imageCalls[0].imagePaths).toEqual([renderPath, referencePath]);
	});
});
