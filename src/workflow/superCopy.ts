import fs from "fs/promises";
import path from "path";

import type { OrganizerContext } from "../context";
import type { Logger } from "../logger";
import { collectMediaFiles, dedupeByStem } from "../scan/traversal";
import type { ProcessedSet } from "../state/ProcessedSet";
import type { MediaKind } from "../types/MediaKind";
import {
	type CopyStats,
	createCopyReport,
	ProgressPhase,
	type ProgressListener,
} from "../types/Report";
import { errorMessage } from "../utils/errors";
import {
	copyFilePreserving,
	isDirectory,
	removeEmptyDirectories,
	removeFileQuietly,
} from "../utils/fsOps";
import { hashFile } from "../utils/hash";
import { createMediaEngine, type MediaEngine } from "./engine";

export type CopyFn = (source: string, destination: string) => Promise<void>;
export type HashFn = (filePath: string) => Promise<string>;

export interface SuperCopyOptions {
	source?: string;
	target?: string;
	/** Report what would be copied without any file I/O */
	dryRun?: boolean;
	listener?: ProgressListener;
	/** Checked between files; an aborted run stops before the next file */
	signal?: AbortSignal;
}

export interface SuperCopyPipelineOptions {
	engine?: MediaEngine;
	/**
	 * Sources copied by earlier runs. When given, those are skipped and new
	 * copies are recorded (used by the auto-copy daemon).
	 */
	processed?: ProcessedSet;
	copyFile?: CopyFn;
	hashFile?: HashFn;
}

type VerifyResult = { ok: true } | { ok: false; reason: string };

interface PlacedCopy {
	targetDir: string;
	unifiedBasename?: string;
	destination: string;
}

interface PrimaryUnit {
	filePath: string;
	kind: MediaKind;
	related: string[];
}

/**
 * Copies a source tree into the organized layout, verifying each media copy
 * with SHA-256 and sweeping everything else into an overflow folder.
 */
export class SuperCopyPipeline {
	private readonly logger: Logger;
	private readonly engine: MediaEngine;
	private readonly copy: CopyFn;
	private readonly hash: HashFn;

	constructor(
		private ctx: OrganizerContext,
		private options: SuperCopyPipelineOptions = {},
	) {
		this.logger = ctx.logger.child({ scope: "super-copy" });
		this.engine = options.engine ?? createMediaEngine(ctx);
		this.copy = options.copyFile ?? copyFilePreserving;
		this.hash = options.hashFile ?? ((filePath) => hashFile(filePath));
	}

	async run(options: SuperCopyOptions = {}): Promise<CopyStats> {
		const config = this.ctx.config;
		const dryRun = Boolean(options.dryRun);
		const source = path.resolve(options.source || config.superCopySource || ".");
		const target = path.resolve(options.target || config.superCopyTarget || ".");
		const processed = this.options.processed;
		const stats: CopyStats = { ok: 0, fail: 0, skip: 0, report: createCopyReport() };
		const report = stats.report;

		if (!(await isDirectory(source))) {
			this.logger.error({ source }, "Super copy source is missing or not a directory.");
			return stats;
		}
		if (!dryRun) {
			await fs.mkdir(target, { recursive: true });
		}
		await processed?.ensureLoaded();

		const collected = await collectMediaFiles(
			this.engine.traverse(source),
			this.engine.classifier,
		);
		const toProcess = dedupeByStem(collected).filter(
			(filePath) => !isInside(target, filePath),
		);
		this.logger.info(
			{ source, media: collected.length, units: toProcess.length },
			"Scanned super copy source.",
		);
		if (toProcess.length === 0) {
			this.logger.warn(
				{ source },
				"No media found; check the configured image, video and audio extensions.",
			);
		}

		const units: PrimaryUnit[] = [];
		const mediaPaths = new Set<string>();
		for (const filePath of toProcess) {
			const kind = await this.engine.classifier.classify(filePath);
			if (!kind) {
				stats.skip += 1;
				continue;
			}
			const related = await this.engine.relations.relatedFiles(filePath);
			units.push({ filePath, kind, related });
			mediaPaths.add(filePath);
			for (const relatedPath of related) {
				mediaPaths.add(relatedPath);
			}
		}
		const candidates = await this.collectOverflow(source, target);
		let total =
			units.reduce((sum, unit) => sum + 1 + unit.related.length, 0) +
			candidates.filter(({ filePath }) => !mediaPaths.has(filePath)).length;

		const emit = (phase: ProgressPhase, message: string, current: number, eventTotal = total) => {
			if (!options.listener) {
				return;
			}
			try {
				options.listener.onProgress({ phase, message, current, total: eventTotal });
			} catch (error) {
				this.logger.debug({ err: errorMessage(error) }, "Progress listener failed.");
			}
		};

		emit(ProgressPhase.PROGRESS, "", 0, Math.max(1, total));

		const claimed = dryRun ? new Set<string>() : undefined;
		const copied = new Set<string>();
		let current = 0;

		for (const unit of units) {
			if (options.signal?.aborted) {
				this.logger.warn({ source }, "Super copy stopped before completion.");
				break;
			}
			const { filePath, kind, related } = unit;

			if (processed?.isProcessed(filePath)) {
				stats.skip += 1;
				report.mediaSkip.push([filePath, "already copied"]);
				current += 1 + related.length;
				emit(ProgressPhase.PROGRESS, "", current);
				continue;
			}

			let placed: PlacedCopy;
			try {
				placed = await this.place(filePath, kind, target, claimed);
			} catch (error) {
				stats.fail += 1;
				report.mediaFail.push([filePath, errorMessage(error)]);
				this.logger.error({ file: filePath, err: errorMessage(error) }, "Unable to place file.");
				current += 1 + related.length;
				emit(ProgressPhase.PROGRESS, "", current);
				continue;
			}
			const { targetDir, unifiedBasename, destination } = placed;

			current += 1;
			const primaryStep = current;
			const result = await this.copyVerified(filePath, destination, dryRun, (phase, message) =>
				emit(phase, message, primaryStep),
			);
			if (!result.ok) {
				stats.fail += 1;
				report.mediaFail.push([filePath, result.reason]);
				this.logger.error({ file: filePath, err: result.reason }, "Super copy failed.");
				// Companions of a failed primary are not copied
				current += related.length;
				emit(ProgressPhase.PROGRESS, "", current);
				continue;
			}
			emit(ProgressPhase.PROGRESS, "", current);
			stats.ok += 1;
			report.mediaOk.push([filePath, destination]);
			copied.add(filePath);
			await this.record(dryRun, filePath);

			for (const relatedPath of related) {
				current += 1;
				const relatedStep = current;
				let relatedResult: VerifyResult;
				let relatedDestination = "";
				try {
					relatedDestination = await this.engine.placement.resolveDestination(
						targetDir,
						relatedPath,
						unifiedBasename,
						claimed,
					);
					relatedResult = await this.copyVerified(
						relatedPath,
						relatedDestination,
						dryRun,
						(phase, message) => emit(phase, message, relatedStep),
					);
				} catch (error) {
					relatedResult = { ok: false, reason: errorMessage(error) };
				}
				emit(ProgressPhase.PROGRESS, "", current);
				if (!relatedResult.ok) {
					report.mediaFail.push([relatedPath, relatedResult.reason]);
					this.logger.warn(
						{ file: relatedPath, err: relatedResult.reason },
						"Super copy of related file failed.",
					);
					continue;
				}
				stats.ok += 1;
				report.mediaOk.push([relatedPath, relatedDestination]);
				copied.add(relatedPath);
				await this.record(dryRun, relatedPath);
			}
		}

		// Media that was not copied joins the sweep; the total grows to match
		const pending = candidates.filter(({ filePath }) => !copied.has(filePath));
		total += pending.filter(({ filePath }) => mediaPaths.has(filePath)).length;
		if (!options.signal?.aborted && pending.length > 0) {
			emit(ProgressPhase.PROGRESS, "Copying other files...", current);
			const overflowRoot = path.join(target, config.overflowFolder);
			for (const { filePath, relative } of pending) {
				if (options.signal?.aborted) {
					break;
				}
				current += 1;
				emit(ProgressPhase.PROGRESS, `Other file: ${relative}`, current);
				await this.copyOverflowFile(filePath, relative, overflowRoot, dryRun, stats);
			}
		}

		if (!dryRun) {
			if (config.deleteEmptyFolders) {
				const removed = await removeEmptyDirectories(target, this.logger);
				if (removed > 0) {
					this.logger.info({ target, removed }, "Removed empty folders.");
				}
			}
		}
		this.logger.info(
			{ source, target, ok: stats.ok, fail: stats.fail, skip: stats.skip, dryRun },
			"Super copy finished.",
		);
		return stats;
	}

	private async place(
		filePath: string,
		kind: MediaKind,
		target: string,
		claimed?: Set<string>,
	): Promise<PlacedCopy> {
		const placement = await this.engine.placement.plan(filePath, kind, target);
		const destination = await this.engine.placement.resolveDestination(
			placement.targetDir,
			filePath,
			placement.unifiedBasename,
			claimed,
		);
		return {
			targetDir: placement.targetDir,
			unifiedBasename: placement.unifiedBasename,
			destination,
		};
	}

	/**
	 * Hash the source, copy, hash the copy and compare. Any failure after the
	 * copy started removes the destination.
	 */
	async copyVerified(
		source: string,
		destination: string,
		dryRun: boolean,
		onPhase: (phase: ProgressPhase, message: string) => void = () => undefined,
	): Promise<VerifyResult> {
		if (dryRun) {
			this.logger.info({ file: source, target: destination }, "Would copy file.");
			return { ok: true };
		}
		const sourceName = path.basename(source);
		const destinationName = path.basename(destination);

		onPhase(ProgressPhase.HASH_SOURCE, `Hashing source: ${sourceName}`);
		let sourceHash: string;
		try {
			sourceHash = await this.hash(source);
		} catch (error) {
			onPhase(ProgressPhase.VERIFY_FAIL, `Failed: cannot hash source ${sourceName}`);
			return { ok: false, reason: `Unable to hash source file: ${errorMessage(error)}` };
		}

		onPhase(ProgressPhase.COPY, `Copying: ${sourceName}`);
		try {
			await fs.mkdir(path.dirname(destination), { recursive: true });
			await this.copy(source, destination);
		} catch (error) {
			await removeFileQuietly(destination, this.logger);
			onPhase(ProgressPhase.VERIFY_FAIL, `Failed: copy error ${sourceName}`);
			return { ok: false, reason: errorMessage(error) };
		}

		onPhase(ProgressPhase.HASH_DESTINATION, `Verifying copy: ${destinationName}`);
		let destinationHash: string;
		try {
			destinationHash = await this.hash(destination);
		} catch (error) {
			await removeFileQuietly(destination, this.logger);
			onPhase(ProgressPhase.VERIFY_FAIL, `Failed: cannot hash copy ${destinationName}`);
			return {
				ok: false,
				reason: `Unable to hash destination file: ${errorMessage(error)}`,
			};
		}

		if (sourceHash !== destinationHash) {
			await removeFileQuietly(destination, this.logger);
			onPhase(ProgressPhase.VERIFY_FAIL, `Failed: hash mismatch ${sourceName}`);
			return {
				ok: false,
				reason: `Hash mismatch: source=${sourceHash.slice(0, 16)}... destination=${destinationHash.slice(0, 16)}...`,
			};
		}

		this.logger.info({ file: source, target: destination }, "Copied and verified.");
		onPhase(ProgressPhase.VERIFY_OK, `Verified: ${sourceName}`);
		return { ok: true };
	}

	/**
	 * Source files that are not left in place and not recorded as copied.
	 * Whatever of these the media pass does not copy goes to
	 * `target/<overflow>/<relative path>` without verification.
	 */
	private async collectOverflow(
		source: string,
		target: string,
	): Promise<Array<{ filePath: string; relative: string }>> {
		const processed = this.options.processed;
		const pending: Array<{ filePath: string; relative: string }> = [];
		for await (const filePath of this.engine.traverse(source)) {
			if (isInside(target, filePath)) {
				continue;
			}
			if (this.engine.classifier.shouldLeaveInPlace(filePath)) {
				continue;
			}
			if (processed?.isProcessed(filePath)) {
				continue;
			}
			pending.push({ filePath, relative: path.relative(source, filePath) });
		}
		return pending;
	}

	private async copyOverflowFile(
		filePath: string,
		relative: string,
		overflowRoot: string,
		dryRun: boolean,
		stats: CopyStats,
	): Promise<void> {
		if (dryRun) {
			this.logger.info({ file: filePath }, "Would copy other file.");
			stats.ok += 1;
			stats.report.otherOk.push(relative);
			return;
		}
		const destination = path.join(overflowRoot, relative);
		try {
			await fs.mkdir(path.dirname(destination), { recursive: true });
			await this.copy(filePath, destination);
			stats.ok += 1;
			stats.report.otherOk.push(relative);
			await this.record(dryRun, filePath);
			this.logger.info({ file: relative }, "Copied other file.");
		} catch (error) {
			stats.report.otherFail.push([relative, errorMessage(error)]);
			this.logger.warn({ file: relative, err: errorMessage(error) }, "Other file copy failed.");
		}
	}

	/** Mark a copied source and save the record straight away */
	private async record(dryRun: boolean, filePath: string): Promise<void> {
		const processed = this.options.processed;
		if (dryRun || !processed) {
			return;
		}
		processed.markProcessed(filePath);
		await processed.persist();
	}
}

function isInside(root: string, filePath: string): boolean {
	const relative = path.relative(root, filePath);
	return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}
