export {
  Article,
  compareStrings,
  DEFAULT_ARTICLE_EXTENSION,
  DEFAULT_SOURCE_LANGUAGE,
  type ArticleOptions,
} from "./article";
export { compareConflicts, comparePullRequests, isArticleFile } from "./detector";
export { parsePatchSet } from "./diff";
export { DiffParseError, MalformedPathError, MissingDiffError } from "./errors";
export {
  CONFLICT_TEMPLATES,
  DEFAULT_MAX_LISTED_FILES,
  renderCommentHeader,
  renderConflictComment,
  type RenderConflictCommentOptions,
} from "./markdown";
