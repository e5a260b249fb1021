import { flattenLeveled } from '../catalog/levels.js';
import type {
  FeatureFilter,
  LeveledTree,
  ResolutionResult,
  SourceFeatureNode,
  TargetFeatureNode
} from '../types/index.js';
import { createResult, mergeResults } from './choices.js';
import { ChoiceResolver, type ChoiceResolverOptions } from './resolver.js';

export type LeveledResolverOptions = Omit<ChoiceResolverOptions, 'result'>;

/**
 * Drives the resolver over source selections against a whole leveled target
 * tree. Source levels are ignored when matching because the two systems grant
 * the same slot at different levels. The filter can be changed between passes
 * so one instance serves the unfiltered class pass and the per-domain passes.
 * Each call returns only its own choices; `result` holds every call's.
 */
export class LeveledChoiceResolver {
  readonly available: LeveledTree<TargetFeatureNode>;
  private readonly options: LeveledResolverOptions;
  private readonly scope: TargetFeatureNode[];
  private readonly state: ResolutionResult = createResult();
  private filter?: FeatureFilter;

  constructor(available: LeveledTree<TargetFeatureNode>, options: LeveledResolverOptions) {
    this.available = available;
    this.options = options;
    this.scope = flattenLeveled(available);
    this.filter = options.filter;
  }

  get result(): ResolutionResult {
    return this.state;
  }

  get isEmpty(): boolean {
    return this.scope.length === 0;
  }

  setFilter(filter?: FeatureFilter) {
    this.filter = filter;
  }

  clearFilter() {
    this.filter = undefined;
  }

  /** Runs one call into its own result, then folds that result into the running one. */
  private run(body: (resolver: ChoiceResolver) => void): ResolutionResult {
    const pass = createResult();
    body(new ChoiceResolver(this.scope, { ...this.options, filter: this.filter, result: pass }));
    mergeResults(this.state, pass);
    return pass;
  }

  processFeature(feature: SourceFeatureNode): ResolutionResult {
    return this.run((resolver) => resolver.resolve(feature));
  }

  process(features: readonly SourceFeatureNode[]): ResolutionResult {
    return this.run((resolver) => resolver.resolveAll(features));
  }

  processLeveled(tree: LeveledTree<SourceFeatureNode>): ResolutionResult {
    return this.run((resolver) => {
      for (const bucket of tree) {
        resolver.resolveAll(bucket.features);
      }
    });
  }
}

export function resolveOne(
  feature: SourceFeatureNode,
  targetTree: LeveledTree<TargetFeatureNode>,
  options: LeveledResolverOptions
): ResolutionResult {
  return new LeveledChoiceResolver(targetTree, options).processFeature(feature);
}

export function resolveLeveled(
  sourceTree: LeveledTree<SourceFeatureNode>,
  targetTree: LeveledTree<TargetFeatureNode>,
  options: LeveledResolverOptions
): ResolutionResult {
  return new LeveledChoiceResolver(targetTree, options).processLeveled(sourceTree);
}
