/**
 * File and directory names used by the persistence layer and the CLI.
 */
export const ANNOTATION_FILES = {
  /** Completion ledger, stored inside the output directory */
  LEDGER: '.annotated.txt',
  /** Default output directory for masks */
  OUTPUT_DIR: 'GT',
  /** Default reference label file, looked up in the working directory */
  LABELS: 'manlabel.txt',
  /** Extension of written masks */
  MASK_EXTENSION: '.png',
} as const;

/** Extensions the image directory scan picks up (lower case) */
export const IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg'];
