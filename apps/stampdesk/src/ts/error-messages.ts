/**
 * User-facing error messages
 *
 * Each failure becomes a notification that names the affected document
 * and says what to do next, in the "what happened" + "what to do" format.
 */

import { isStampDeskError, type StampDeskErrorCode } from './errors';

/**
 * User-friendly error structure
 */
export interface UserError {
  /** Short, clear title describing the problem */
  title: string;
  /** Detailed explanation in plain language */
  message: string;
  /** Suggested action the user can take */
  action: string;
  /** Icon identifier for visual context */
  icon: ErrorIcon;
}

export type ErrorIcon =
  | 'image' // Stamp image problems
  | 'file' // Document problems
  | 'stamp' // Placement problems
  | 'pages' // Page reorder problems
  | 'folder' // Disk and permission problems
  | 'alert'; // Anything else

type ErrorTemplate = Omit<UserError, 'message'> & {
  message: (documentName: string) => string;
};

const ERROR_TEMPLATES: Record<StampDeskErrorCode, ErrorTemplate> = {
  IMAGE_DECODE: {
    title: 'Stamp Image Problem',
    message: (name) => `A stamp image on "${name}" could not be read.`,
    action: 'Choose a PNG or JPEG image for the stamp and export again.',
    icon: 'image',
  },
  PDF_INSPECTION: {
    title: 'Document Could Not Be Opened',
    message: (name) => `"${name}" appears to be damaged, encrypted or not a PDF.`,
    action: 'Open the file in another viewer to check it, or use a different copy.',
    icon: 'file',
  },
  WATERMARK_PLACEMENT: {
    title: 'Stamp Could Not Be Placed',
    message: (name) => `A stamp on "${name}" could not be placed on its page.`,
    action: 'Move or resize the stamp so it sits on a page, then export again.',
    icon: 'stamp',
  },
  PAGE_COLLECTION: {
    title: 'Pages Could Not Be Rearranged',
    message: (name) => `The page changes to "${name}" could not be applied. The document was not changed.`,
    action: 'Check that at least one page is kept and try again.',
    icon: 'pages',
  },
  FILE_SYSTEM: {
    title: 'File Could Not Be Saved',
    message: (name) => `The result for "${name}" could not be written to disk.`,
    action: 'Check that the Downloads folder exists, is writable and has free space.',
    icon: 'folder',
  },
  INVALID_INPUT: {
    title: 'Something Is Not Quite Right',
    message: (name) => `A stamp or page setting on "${name}" is not valid.`,
    action: 'Check the stamps on this document and try again.',
    icon: 'alert',
  },
  UNEXPECTED: {
    title: 'Something Went Wrong',
    message: (name) => `"${name}" could not be processed.`,
    action: 'Try again. If the problem continues, restart the app.',
    icon: 'alert',
  },
};

/**
 * Notification content for a failure on `documentName`
 */
export function getUserFriendlyError(error: unknown, documentName: string): UserError {
  const template = ERROR_TEMPLATES[isStampDeskError(error) ? error.code : 'UNEXPECTED'];
  return {
    title: template.title,
    message: template.message(documentName),
    action: template.action,
    icon: template.icon,
  };
}

/**
 * One-line rendering for toasts and logs
 */
export function formatNotification(userError: UserError): string {
  return `${userError.title}: ${userError.message} ${userError.action}`;
}
