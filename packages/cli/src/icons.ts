/**
 * Icon mapping for rendered nodes.
 */

import { isFolder } from '@arbor/core';
import type { TreeNode } from '@arbor/core';
import type { ArborConfig } from './config-loader.js';

export type IconSet = Pick<ArborConfig, 'fileIcon' | 'folderIcon' | 'extensionIcons'>;

/**
 * Lower-case extension of a name, dot included. Empty for names without
 * one, and for dotfiles such as ".gitignore".
 */
export function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

export function iconFor(node: TreeNode, icons: IconSet): string {
  if (isFolder(node)) {
    return icons.folderIcon;
  }
  return icons.extensionIcons[extensionOf(node.name)] ?? icons.fileIcon;
}
