import { BlockKitError, checkCardinality, checkStringLength } from './block-kit.errors';
import { Block } from './blocks';
import { SerializedNode, serializeBlocks, serializeText } from './serializer';
import { BoundedText, checkTextField, TextType } from './text';

export const VIEW_MAX_BLOCKS = 100;
export const MESSAGE_MAX_BLOCKS = 50;
export const VIEW_TITLE_MAX_LENGTH = 24;
export const CALLBACK_ID_MAX_LENGTH = 255;
export const PRIVATE_METADATA_MAX_LENGTH = 3000;

export interface ModalViewProps {
  title: BoundedText;
  blocks: readonly Block[];
  submit?: BoundedText;
  close?: BoundedText;
  /** Identifies the view in submission payloads */
  callbackId?: string;
  privateMetadata?: string;
}

export interface HomeViewProps {
  blocks: readonly Block[];
  callbackId?: string;
  privateMetadata?: string;
}

export interface ModalView extends SerializedNode {
  type: 'modal';
  blocks: SerializedNode[];
}

export interface HomeView extends SerializedNode {
  type: 'home';
  blocks: SerializedNode[];
}

function checkViewMetadata(callbackId?: string, privateMetadata?: string): void {
  if (callbackId !== undefined) {
    checkStringLength('view.callbackId', callbackId, CALLBACK_ID_MAX_LENGTH);
  }
  if (privateMetadata !== undefined) {
    checkStringLength('view.privateMetadata', privateMetadata, PRIVATE_METADATA_MAX_LENGTH);
  }
}

/**
 * Block ids must be unique within one document.
 */
function checkUniqueBlockIds(blocks: readonly Block[]): void {
  const seen = new Set<string>();
  blocks.forEach((block, i) => {
    if (block.blockId === undefined) return;
    if (seen.has(block.blockId)) {
      throw new BlockKitError(
        'ReferenceIntegrityViolation',
        `blocks[${i}].blockId`,
        `duplicate block id "${block.blockId}"`,
      );
    }
    seen.add(block.blockId);
  });
}

export function modalView(props: ModalViewProps): ModalView {
  const title = checkTextField('view.title', props.title, VIEW_TITLE_MAX_LENGTH, TextType.Plain);
  const submit = props.submit
    ? checkTextField('view.submit', props.submit, VIEW_TITLE_MAX_LENGTH, TextType.Plain)
    : undefined;
  const close = props.close
    ? checkTextField('view.close', props.close, VIEW_TITLE_MAX_LENGTH, TextType.Plain)
    : undefined;
  checkViewMetadata(props.callbackId, props.privateMetadata);
  checkCardinality('view.blocks', props.blocks, 0, VIEW_MAX_BLOCKS);
  checkUniqueBlockIds(props.blocks);

  const view: ModalView = { type: 'modal', blocks: serializeBlocks(props.blocks) };
  view.title = serializeText(title);
  if (submit) view.submit = serializeText(submit);
  if (close) view.close = serializeText(close);
  if (props.callbackId !== undefined) view.callback_id = props.callbackId;
  if (props.privateMetadata !== undefined) view.private_metadata = props.privateMetadata;
  return view;
}

export function homeView(props: HomeViewProps): HomeView {
  checkViewMetadata(props.callbackId, props.privateMetadata);
  checkCardinality('view.blocks', props.blocks, 0, VIEW_MAX_BLOCKS);
  checkUniqueBlockIds(props.blocks);

  const view: HomeView = { type: 'home', blocks: serializeBlocks(props.blocks) };
  if (props.callbackId !== undefined) view.callback_id = props.callbackId;
  if (props.privateMetadata !== undefined) view.private_metadata = props.privateMetadata;
  return view;
}

/**
 * Serialize the blocks of a channel message.
 */
export function messageBlocks(blocks: readonly Block[]): SerializedNode[] {
  checkCardinality('message.blocks', blocks, 0, MESSAGE_MAX_BLOCKS);
  checkUniqueBlockIds(blocks);
  return serializeBlocks(blocks);
}
