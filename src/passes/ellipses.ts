import type { Pass } from "../types";
import { rewriteText } from "./helpers";

export const ellipsesPass: Pass = {
  name: "ellipses",

  run(article) {
    rewriteText(article.content, ["verbatim", "link"], (data) =>
      data.replace(/\.\.\./g, "…"),
    );
  },
};
