/**
 * Story files and the document converter behind them.
 */

export {
  LibreOfficeConverter,
  DocumentConversionError,
  STORY_RTF_STYLES,
  readDocumentText,
  type DocumentConverter,
  type RtfStyleSwap,
  type LibreOfficeConverterOptions,
} from "./converter.js";

export { getRtfStyles, replaceRtfStyle, RtfStyleError } from "./rtf.js";

export {
  processStory,
  planStoryFormats,
  normalizeStoryLines,
  escapeStoryMarkdown,
  formatStoryText,
  formatStoryMarkdown,
  formatStoryRtfSource,
  StoryProcessingError,
  type StoryFormat,
  type ProcessStoryOptions,
} from "./story.js";
