// Builders for daily menu markup shaped like the live page

export interface BlockSpec {
  location?: string;
  station?: string;
  /** raw <li class="dm-menu-item"> inner HTML */
  items?: string[];
  nested?: string[];
}

export function menuBlock({ location, station, items, nested = [] }: BlockSpec): string {
  const parts: string[] = ['<div class="entity-paragraphs-item">'];
  if (location !== undefined) {
    parts.push(`<ul class="dm-outlet"><li class="dm-location">${location}</li></ul>`);
  }
  if (station !== undefined) {
    parts.push(`<ul class="dm-whole-outlet"><li class="dm-menu-type">${station}</li></ul>`);
  }
  if (items !== undefined) {
    parts.push(
      '<ul class="dm-menus">',
      ...items.map((item) => `<li class="dm-menu-item">${item}</li>`),
      "</ul>"
    );
  }
  parts.push(...nested, "</div>");
  return parts.join("\n");
}

export function menuPage(...blocks: string[]): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en"><head><meta charset="utf-8"><title>Daily menu</title></head>',
    '<body><div class="view-content">',
    ...blocks,
    "</div></body></html>",
  ].join("\n");
}

export const CLOSED_PAGE = menuPage(
  '<div class="view-empty"><p>There are no menus available for this date.</p></div>'
);
