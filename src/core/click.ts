import { invalidValue, requireText } from './errors.js';

/** Navigation attached to a node: `click v0 [href ]"url"[ "tooltip"][ _blank]` */
export interface ClickEvent {
  url: string;
  /** Open the link in a new tab (`_blank`) */
  newTab?: boolean;
  /** Emit the `href` keyword before the url */
  anchor?: boolean;
  tooltip?: string;
}

const URL_BREAKERS = /["\s]/;

export function validateClick(click: ClickEvent): Readonly<ClickEvent> {
  const url = requireText('click.url', click.url);
  if (URL_BREAKERS.test(url)) {
    throw invalidValue('click.url', `Click url cannot contain quotes or whitespace, got '${url}'.`, 'Percent-encode the url.');
  }
  const event: ClickEvent = { url };
  if (click.newTab !== undefined) event.newTab = click.newTab;
  if (click.anchor !== undefined) event.anchor = click.anchor;
  if (click.tooltip !== undefined) event.tooltip = requireText('click.tooltip', click.tooltip);
  return Object.freeze(event);
}
