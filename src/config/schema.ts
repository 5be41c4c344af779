import * as z from "zod";

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		url: z
			.string()
			.url()
			.regex(/^https?:\/\//i, { message: "url must use http or https" }),
		downloadDir: z.string().min(1).optional(),
		timeoutMs: z.number().int().min(1).optional(),
		retries: z.number().int().min(0).max(10).optional(),
		verifyDownloads: z.boolean().optional(),
		failFast: z.boolean().optional(),
	})
	.strict();

export type MirrorConfig = z.infer<typeof ConfigSchema>;
