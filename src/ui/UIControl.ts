/**
 * UIControl - Contract shared by the preview, buttons and status line
 *
 * `App` appends each control's element to its layout and disposes every
 * control when it unmounts.
 */
export interface UIControl {
  getElement(): HTMLElement;
  dispose(): void;
}
