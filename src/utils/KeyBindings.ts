/**
 * Default keyboard shortcuts configuration
 *
 * Each entry maps a key to the command the KeyboardManager resolves it to.
 * w/a/s/d pan instead of the arrow keys so that arrow keys stay free for
 * toolkit controls.
 */

import type { KeyCombination } from './KeyboardManager';
import type { Command } from './input/InputEvents';

export interface KeyBindingConfig {
  [action: string]: KeyCombination & { command: Command; description: string };
}

export const DEFAULT_KEY_BINDINGS: KeyBindingConfig = {
  // Navigation
  'session.next': {
    key: 'n',
    command: 'next',
    description: 'Save the mask and go to the next image',
  },
  'session.nextAlt': {
    key: 'Enter',
    command: 'next',
    description: 'Save the mask and go to the next image (alternative)',
  },
  'session.previous': {
    key: 'p',
    command: 'previous',
    description: 'Save the mask and go to the previous image',
  },
  'session.previousAlt': {
    key: 'Backspace',
    command: 'previous',
    description: 'Save the mask and go to the previous image (alternative)',
  },
  'session.quit': {
    key: 'q',
    command: 'quit',
    description: 'Quit without saving the current image',
  },
  'session.quitAlt': {
    key: 'Escape',
    command: 'quit',
    description: 'Quit without saving the current image (alternative)',
  },

  // Mark size
  'paint.radiusUp': {
    key: '+',
    command: 'mark-radius-up',
    description: 'Increase the mark radius by 5',
  },
  'paint.radiusDown': {
    key: '-',
    command: 'mark-radius-down',
    description: 'Decrease the mark radius by 5',
  },

  // View
  'view.zoomIn': {
    key: 'f',
    command: 'zoom-in',
    description: 'Zoom in around the cursor',
  },
  'view.zoomOut': {
    key: 'g',
    command: 'zoom-out',
    description: 'Zoom out around the cursor',
  },
  'view.zoomOutFull': {
    key: 'G',
    command: 'zoom-out-full',
    description: 'Show the whole image',
  },
  'view.panLeft': {
    key: 'a',
    command: 'pan-left',
    description: 'Move the view left',
  },
  'view.panUp': {
    key: 'w',
    command: 'pan-up',
    description: 'Move the view up',
  },
  'view.panRight': {
    key: 'd',
    command: 'pan-right',
    description: 'Move the view right',
  },
  'view.panDown': {
    key: 's',
    command: 'pan-down',
    description: 'Move the view down',
  },
  'view.toggleReferences': {
    key: 'z',
    command: 'toggle-reference-display',
    description: 'Show or hide reference rectangles',
  },
  'view.toggleFilename': {
    key: 'i',
    command: 'toggle-filename-display',
    description: 'Show or hide the file name',
  },
};
