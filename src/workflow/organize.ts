import path from "path";

import type { OrganizerContext } from "../context";
import type { Logger } from "../logger";
import type { Placement } from "../placement/PlacementResolver";
import { collectMediaFiles, dedupeByStem } from "../scan/traversal";
import { ProcessedSet } from "../state/ProcessedSet";
import type { OrganizeEntry, OrganizeReport } from "../types/Report";
import { errorMessage } from "../utils/errors";
import {
	copyFilePreserving,
	isDirectory,
	moveFile,
	removeEmptyDirectories,
} from "../utils/fsOps";
import { isDateLikeFolder, sanitizeFolderName } from "../utils/naming";
import { createMediaEngine, type MediaEngine } from "./engine";

export interface OrganizeOptions {
	source?: string;
	output?: string;
	/** Report what would happen without touching files or the processed set */
	dryRun?: boolean;
	/** Plan only; the processed set is not consulted */
	scanOnly?: boolean;
	/** Checked between files; an aborted run stops before the next file */
	signal?: AbortSignal;
}

export interface OrganizePipelineOptions {
	engine?: MediaEngine;
	processed?: ProcessedSet;
}

interface RunState {
	output: string;
	dryRun: boolean;
	entries: OrganizeEntry[];
	/** Destinations handed out by a run that writes nothing */
	claimed?: Set<string>;
	/** Sources already routed this run, as companions of an earlier file */
	handled: Set<string>;
}

/**
 * Sorts a source tree into `date/kind/device` folders, moving files (or
 * copying them when `move_files` is off) together with their companions.
 */
export class OrganizePipeline {
	private readonly logger: Logger;
	private readonly engine: MediaEngine;
	readonly processed: ProcessedSet;

	constructor(
		private ctx: OrganizerContext,
		options: OrganizePipelineOptions = {},
	) {
		this.logger = ctx.logger.child({ scope: "organize" });
		this.engine = options.engine ?? createMediaEngine(ctx);
		this.processed =
			options.processed ??
			new ProcessedSet(ctx.config.processedSetPath, this.logger);
	}

	async run(options: OrganizeOptions = {}): Promise<OrganizeReport> {
		const config = this.ctx.config;
		const scanOnly = Boolean(options.scanOnly);
		const dryRun = Boolean(options.dryRun);
		const source = path.resolve(options.source || config.sourcePath || ".");
		let output = path.resolve(options.output || config.outputPath || source);

		const report: OrganizeReport = {
			mode: scanOnly ? "scan_only" : "organize",
			source,
			output,
			totalMedia: 0,
			toProcess: 0,
			entries: [],
		};

		if (!(await isDirectory(source))) {
			this.logger.error({ source }, "Source path is missing or not a directory.");
			return report;
		}
		if (source === output) {
			// Organize in place, into subfolders of the source
			output = source;
		}

		const collected = await collectMediaFiles(
			this.engine.traverse(source),
			this.engine.classifier,
		);
		const toProcess = dedupeByStem(collected);
		report.totalMedia = collected.length;
		report.toProcess = toProcess.length;
		this.logger.info(
			{ source, media: collected.length, units: toProcess.length },
			"Scanned source tree.",
		);

		const state: RunState = {
			output,
			dryRun,
			entries: report.entries,
			claimed: scanOnly || dryRun ? new Set<string>() : undefined,
			handled: new Set<string>(),
		};

		if (!scanOnly) {
			await this.processed.ensureLoaded();
		}

		for (const filePath of toProcess) {
			if (options.signal?.aborted) {
				this.logger.warn({ source }, "Organize run stopped before completion.");
				break;
			}
			if (state.handled.has(filePath)) {
				continue;
			}
			if (scanOnly) {
				await this.planFile(filePath, state);
			} else {
				await this.processFile(filePath, state);
			}
		}

		if (scanOnly) {
			return report;
		}

		if (!dryRun) {
			await this.processed.persist(true);
			if (config.deleteEmptyFolders) {
				await this.cleanEmptyFolders(source, output);
			}
		}
		this.logger.info(
			{ source, output, units: toProcess.length, dryRun },
			"Organize run finished.",
		);
		return report;
	}

	/**
	 * Whether a processed file already sits in a `date/kind/device` layout
	 * under a known device. Anything else is classified again.
	 */
	isAlreadyPlaced(filePath: string, output: string): boolean {
		const relative = path.relative(output, path.resolve(filePath));
		if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
			// Copies leave the originals behind; do not copy them again
			return !this.ctx.config.moveFiles;
		}
		const parts = relative.split(path.sep);
		if (parts.length < 3 || !isDateLikeFolder(parts[0])) {
			return false;
		}
		const unknown = sanitizeFolderName(this.ctx.config.deviceUnknownName);
		return parts[2] !== unknown;
	}

	private async planFile(filePath: string, state: RunState): Promise<void> {
		let placed: { placement: Placement; destination: string } | undefined;
		try {
			placed = await this.place(filePath, state);
		} catch (error) {
			this.logger.error({ file: filePath, err: errorMessage(error) }, "Unable to place file.");
			state.entries.push({ action: "fail", source: filePath, target: errorMessage(error) });
			return;
		}
		if (!placed) {
			return;
		}
		const { placement, destination } = placed;
		if (destination === filePath) {
			state.entries.push({ action: "skip", source: filePath, target: "already in place" });
			return;
		}
		state.entries.push({ action: "move", source: filePath, target: destination });

		for (const related of await this.engine.relations.relatedFiles(filePath)) {
			state.handled.add(related);
			let relatedDestination: string;
			try {
				relatedDestination = await this.engine.placement.resolveDestination(
					placement.targetDir,
					related,
					placement.unifiedBasename,
					state.claimed,
				);
			} catch (error) {
				state.entries.push({
					action: "fail_related",
					source: related,
					target: errorMessage(error),
				});
				continue;
			}
			if (relatedDestination !== related) {
				state.entries.push({
					action: "related",
					source: related,
					target: relatedDestination,
				});
			}
		}
	}

	private async processFile(filePath: string, state: RunState): Promise<void> {
		if (this.processed.isProcessed(filePath)) {
			if (this.isAlreadyPlaced(filePath, state.output)) {
				this.logger.debug({ file: filePath }, "Already organized, skipping.");
				state.entries.push({
					action: "already_processed",
					source: filePath,
					target: "previously organized",
				});
				return;
			}
			this.logger.info({ file: filePath }, "Reclassifying previously processed file.");
		}

		let placed: { placement: Placement; destination: string } | undefined;
		try {
			placed = await this.place(filePath, state);
		} catch (error) {
			this.logger.error({ file: filePath, err: errorMessage(error) }, "Unable to place file.");
			state.entries.push({ action: "fail", source: filePath, target: errorMessage(error) });
			return;
		}
		if (!placed) {
			return;
		}
		const { placement, destination } = placed;

		if (destination === filePath) {
			state.entries.push({ action: "skip", source: filePath, target: "already in place" });
			this.markProcessed(state, filePath);
			return;
		}

		const related = await this.engine.relations.relatedFiles(filePath);

		try {
			await this.transfer(filePath, destination, state);
			state.entries.push({ action: "move", source: filePath, target: destination });
		} catch (error) {
			this.logger.error(
				{ file: filePath, target: destination, err: errorMessage(error) },
				"Unable to move file.",
			);
			state.entries.push({ action: "fail", source: filePath, target: errorMessage(error) });
			return;
		}

		for (const relatedPath of related) {
			if (this.processed.isProcessed(relatedPath)) {
				continue;
			}
			try {
				const relatedDestination = await this.engine.placement.resolveDestination(
					placement.targetDir,
					relatedPath,
					placement.unifiedBasename,
					state.claimed,
				);
				state.handled.add(relatedPath);
				if (relatedDestination !== relatedPath) {
					await this.transfer(relatedPath, relatedDestination, state);
					state.entries.push({
						action: "related",
						source: relatedPath,
						target: relatedDestination,
					});
				}
				this.markProcessed(state, relatedPath, relatedDestination);
			} catch (error) {
				this.logger.warn(
					{ file: relatedPath, err: errorMessage(error) },
					"Unable to move related file.",
				);
				state.entries.push({
					action: "fail_related",
					source: relatedPath,
					target: errorMessage(error),
				});
			}
		}

		this.markProcessed(state, filePath, destination);
	}

	private async place(
		filePath: string,
		state: RunState,
	): Promise<{ placement: Placement; destination: string } | undefined> {
		const kind = await this.engine.classifier.classify(filePath);
		if (!kind) {
			return undefined;
		}
		const placement = await this.engine.placement.plan(filePath, kind, state.output);
		const destination = await this.engine.placement.resolveDestination(
			placement.targetDir,
			filePath,
			placement.unifiedBasename,
			state.claimed,
		);
		return { placement, destination };
	}

	private async transfer(source: string, destination: string, state: RunState): Promise<void> {
		if (state.dryRun) {
			this.logger.info({ file: source, target: destination }, "Would organize file.");
			return;
		}
		if (this.ctx.config.moveFiles) {
			await moveFile(source, destination);
			this.engine.probe.forget(source);
			this.logger.info({ file: source, target: destination }, "Moved file.");
		} else {
			await copyFilePreserving(source, destination);
			this.logger.info({ file: source, target: destination }, "Copied file.");
		}
	}

	private markProcessed(state: RunState, ...paths: string[]): void {
		if (state.dryRun) {
			return;
		}
		for (const entry of paths) {
			this.processed.markProcessed(entry);
		}
	}

	private async cleanEmptyFolders(source: string, output: string): Promise<void> {
		const roots = new Set([output]);
		if (this.ctx.config.moveFiles) {
			roots.add(source);
		}
		for (const root of roots) {
			const removed = await removeEmptyDirectories(root, this.logger);
			if (removed > 0) {
				this.logger.info({ root, removed }, "Removed empty folders.");
			}
		}
	}
}
