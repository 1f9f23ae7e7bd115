import type { OrganizerContext } from "../context";
import { MetadataProbe } from "../metadata/MetadataProbe";
import { PlacementResolver } from "../placement/PlacementResolver";
import { FileTraversal } from "../scan/traversal";
import { MediaClassifier } from "../utils/fileClassifier";
import { RelationFinder } from "../utils/relatedFiles";

/**
 * Classification machinery shared by the organize and super copy pipelines.
 */
export interface MediaEngine {
	probe: MetadataProbe;
	classifier: MediaClassifier;
	relations: RelationFinder;
	placement: PlacementResolver;
	traverse(root: string): FileTraversal;
}

export function createMediaEngine(ctx: OrganizerContext): MediaEngine {
	const probe = new MetadataProbe(ctx);
	const classifier = new MediaClassifier(ctx.config, probe);
	return {
		probe,
		classifier,
		relations: new RelationFinder({
			classifier,
			logger: ctx.logger.child({ scope: "relations" }),
			enabled: ctx.config.relatedSameStem,
		}),
		placement: new PlacementResolver(ctx, probe),
		traverse: (root) =>
			new FileTraversal(root, {
				logger: ctx.logger.child({ scope: "scan" }),
				ignore: ctx.config.ignore,
			}),
	};
}
