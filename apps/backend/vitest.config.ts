import { defineConfig } from "vitest/config";

const SHARED_INCLUDE = [
	"src/**/*.test.ts",
	"src/**/*.spec.ts",
	"tests/**/*.test.ts",
	"tests/**/*.spec.ts"
];

export default defineConfig({
	test: {
		name: "backend",
		environment: "node",
		include: SHARED_INCLUDE
	}
});
