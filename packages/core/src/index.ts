export { classify, classifyMember, matchAnnotation } from './classifier'
export {
  configNotFoundError,
  ConfigErrorCode,
  ConfigurationError,
  duplicateGroupError,
  invalidOptionsError,
  isConfigurationError,
  unknownGroupError,
} from './errors'
export {
  ANNOTATION_RULES,
  DEFAULT_GROUP_ORDER,
  MemberGroup,
  parseMemberGroup,
} from './groups'
export type { AnnotationRule } from './groups'
export { MemberKind } from './member'
export type { MemberDescriptor } from './member'
export { buildGroupOrder, GroupOrder } from './order'
export { nextVerdict, verifyMembers } from './verifier'
export type { MemberOrderVerdict } from './verifier'
