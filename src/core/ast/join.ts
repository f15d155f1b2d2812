import type { JoinKind } from '../sql/sql.js';
import type { RelationPath } from '../condition/relation-path.js';

/**
 * AST node representing a JOIN clause emitted for a relation path:
 * `<kind> JOIN "<table>" AS "<alias>" ON "<anchor>"."<localColumn>" = "<alias>"."<joinColumn>"`
 */
export interface JoinNode {
  type: 'Join';
  /** Type of join (INNER or LEFT) */
  kind: JoinKind;
  /** Joined table name */
  table: string;
  /** Alias allocated for the relation path */
  alias: string;
  /** Root table name or alias of the parent relation */
  anchor: string;
  /** Column of the joined table compared in the ON clause */
  joinColumn: string;
  /** Column of the anchor compared in the ON clause */
  localColumn: string;
  /** Relation path the join was emitted for */
  path: RelationPath;
}
