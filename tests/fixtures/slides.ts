import type { ProjectDocument } from "../../server/slides/slide-types";

export const PROJECT_DIR = "/tmp/p";

/** A saved three-slide project document */
export const THREE_SLIDE_DOCUMENT: ProjectDocument = {
	slides: [
		{ path: "intro.png", x: 10, y: 20 },
		{ path: "menu.png", x: 300, y: 45 },
		{ path: "dialog.png", x: -5, y: 1080 },
	],
};

export const THREE_SLIDE_JSON = JSON.stringify(THREE_SLIDE_DOCUMENT, null, 2);
