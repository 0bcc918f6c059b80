/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export {
    createCommentRecord,
    kDEFAULT_LABEL_ATTRIBUTE,
    type RawCommentRecord,
    type CommentRecordOptions,
} from "./CommentRecord.js";
