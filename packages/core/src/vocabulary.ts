/**
 * Standard ontology terms used by the built-in mappers and builders.
 */

export const NodeClass = {
  DOCUMENT: 'gw:Document',
  TOPIC: 'gw:Topic',
  CHUNK: 'gw:Chunk',
  TEXT: 'gw:TextFragment',
  TABLE: 'gw:Table',
  CODE_BLOCK: 'gw:CodeBlock',
  LIST_ITEM: 'gw:ListItem',
} as const

export const Predicate = {
  HAS_PARENT: 'gw:hasParent',
  CONTAINS: 'gw:contains',
  NEXT: 'gw:next',
  BELONGS_TO: 'gw:belongsTo',
  MENTIONS: 'gw:mentions',
} as const

export const Attribute = {
  TEXT: 'schema:text',
  SOURCE: 'gw:source',
  TITLE: 'gw:title',
  DESCRIPTION: 'gw:description',
  SEMANTIC_TYPE: 'gw:semanticType',
  PART_INDEX: 'gw:partIndex',
  HEADING_PATH: 'gw:headingPath',
  TOKEN_COUNT: 'gw:tokenCount',
} as const
