import { type Logger, silentLogger } from "#cli/logger";
import { symbols, ui } from "#cli/ui";
import { type SettingsOverrides, resolveMirrorDir } from "#config";
import { inspectLocalPackages } from "#mirror/validate";
import type { PackageRecord, RejectedRecord } from "#types/mirror";

type VerifyOptions = Pick<SettingsOverrides, "configPath" | "downloadDir" | "cwd">;

type VerifyDeps = {
	logger?: Logger;
};

export type VerifyReport = {
	downloadDir: string;
	manifestPath: string;
	manifestFound: boolean;
	trusted: PackageRecord[];
	rejected: RejectedRecord[];
	ok: boolean;
};

export const verifyMirror = async (
	options: VerifyOptions = {},
	deps: VerifyDeps = {},
): Promise<VerifyReport> => {
	const { downloadDir } = await resolveMirrorDir(options);
	const local = await inspectLocalPackages(downloadDir, {
		logger: deps.logger ?? silentLogger,
	});
	return {
		downloadDir,
		manifestPath: local.manifestPath,
		manifestFound: local.manifestFound,
		trusted: Array.from(local.trusted.values()),
		rejected: local.rejected,
		ok: local.manifestFound && local.rejected.length === 0,
	};
};

const REASON_LABELS: Record<RejectedRecord["reason"], string> = {
	invalid: "no filename",
	"unsafe-path": "filename leaves the mirror",
	missing: "file missing",
	"size-mismatch": "size mismatch",
	"checksum-mismatch": "MD5 mismatch",
};

export const printVerify = (report: VerifyReport) => {
	if (!report.manifestFound) {
		ui.line(
			`${symbols.warn} No 'Packages' manifest at ${ui.path(report.manifestPath)}`,
		);
		return;
	}
	const total = report.trusted.length + report.rejected.length;
	ui.line(
		`${symbols.info} Verified ${total} packages (${report.trusted.length} ok, ${report.rejected.length} failed)`,
	);
	for (const record of report.rejected) {
		ui.item(
			symbols.warn,
			record.name,
			`${record.filename || "-"}: ${REASON_LABELS[record.reason]}`,
		);
	}
};
