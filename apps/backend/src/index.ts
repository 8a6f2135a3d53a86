import { describeProject } from "@language-tutor/shared";

import { createTutorApp } from "./api/tutor/index.js";
import { loadTutorConfig } from "./config/tutor.js";

async function main(): Promise<void> {
	const summary = describeProject();
	console.log(`${summary.name} backend starting...`);

	const config = loadTutorConfig();
	if (!config.openaiApiKey) {
		console.warn("OPENAI_API_KEY is not set; lessons cannot start until it is configured.");
	}

	const app = await createTutorApp({ config });

	try {
		await app.listen({ port: config.port, host: config.host });
		console.log(`Tutor API listening at http://${config.host}:${config.port} (mistakes in ${config.databasePath})`);
	} catch (error) {
		console.error("Failed to start tutor backend", error);
		process.exit(1);
	}

	const shutdown = async (signal: string) => {
		console.log(`Received ${signal}. Shutting down tutor backend.`);
		await app.close();
		process.exit(0);
	};

	process.on("SIGINT", () => void shutdown("SIGINT"));
	process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

void main();
