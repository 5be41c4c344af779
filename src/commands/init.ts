import { access } from "node:fs/promises";
import path from "node:path";
import {
	confirm as clackConfirm,
	isCancel as clackIsCancel,
	text as clackText,
} from "@clack/prompts";
import {
	DEFAULT_CONFIG_FILENAME,
	DEFAULT_DOWNLOAD_DIR,
	type MirrorConfig,
	writeConfig,
} from "#config";
import { ConfigSchema } from "#config/schema";

type InitOptions = {
	cwd?: string;
};

type PromptDeps = {
	confirm?: typeof clackConfirm;
	isCancel?: typeof clackIsCancel;
	text?: typeof clackText;
};

export type InitResult = {
	configPath: string;
	config: MirrorConfig;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const validateUrl = (value: string) => {
	const parsed = ConfigSchema.shape.url.safeParse(value.trim());
	return parsed.success ? undefined : "Enter an http(s) URL of a Packages file";
};

export const initConfig = async (
	options: InitOptions = {},
	deps: PromptDeps = {},
): Promise<InitResult> => {
	const cwd = options.cwd ?? process.cwd();
	const confirm = deps.confirm ?? clackConfirm;
	const isCancel = deps.isCancel ?? clackIsCancel;
	const text = deps.text ?? clackText;

	const configPath = path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
	if (await exists(configPath)) {
		throw new Error(`Config already exists at ${configPath}.`);
	}

	const urlAnswer = await text({
		message: "Packages URL",
		placeholder: "https://downloads.example.org/feed/Packages",
		validate: validateUrl,
	});
	if (isCancel(urlAnswer)) {
		throw new Error("Init cancelled.");
	}
	const dirAnswer = await text({
		message: "Download directory",
		initialValue: DEFAULT_DOWNLOAD_DIR,
	});
	if (isCancel(dirAnswer)) {
		throw new Error("Init cancelled.");
	}
	const verifyAnswer = await confirm({
		message: "Check size and MD5 of downloaded packages",
		initialValue: true,
	});
	if (isCancel(verifyAnswer)) {
		throw new Error("Init cancelled.");
	}

	const downloadDir = dirAnswer.trim() || DEFAULT_DOWNLOAD_DIR;
	const config: MirrorConfig = {
		url: urlAnswer.trim(),
		...(downloadDir === DEFAULT_DOWNLOAD_DIR ? {} : { downloadDir }),
		...(verifyAnswer ? {} : { verifyDownloads: false }),
	};
	await writeConfig(configPath, config);
	return { configPath, config };
};
