export interface NoteAttachment {
  id: number;
  noteId: number;
  /** Base name without the extension. */
  fileName: string;
  /** Extension without the leading dot; empty when the file had none. */
  extension: string;
  size: number;
  /** Time-limited retrieval URL. */
  url: string;
}

export interface Note {
  id: number;
  userId: number;
  title: string;
  content: string;
  lastModified: Date;
  isPinned: boolean;
  attachments: NoteAttachment[];
}

export interface CreateNoteResponse {
  id: number;
}
