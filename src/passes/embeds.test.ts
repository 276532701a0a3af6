import { describe, expect, it, vi } from "vitest";
import { fakeCollaborators, makeArticle, markup, passContext } from "../test-utils";
import { embedsPass } from "./embeds";

describe("embedsPass", () => {
  it("links straight to images with an extension", async () => {
    const article = makeArticle("[embed]https://imgur.com/abcde.png[/embed]");
    await embedsPass.run(article, passContext());
    expect(markup(article.content)).toBe('<img src="https://i.imgur.com/abcde.png"/>');
  });

  it("scrapes gallery pages for their first image", async () => {
    const fetchResource = vi.fn(async () =>
      Buffer.from('<div id="image"><img class="post" src="//i.imgur.com/hijkl.jpg"></div>'),
    );
    const ctx = passContext(fakeCollaborators({ fetchResource }));
    const article = makeArticle("Look: [embed]https://imgur.com/gallery/abcdefg[/embed]");

    await embedsPass.run(article, ctx);

    expect(fetchResource).toHaveBeenCalledWith("https://imgur.com/gallery/abcdefg/embed?pub=true");
    expect(markup(article.content)).toBe('Look: <img src="https://i.imgur.com/hijkl.jpg"/>');
  });

  it("keeps the embed when the page has no image", async () => {
    const ctx = passContext(
      fakeCollaborators({ fetchResource: async () => Buffer.from("<p>nothing</p>") }),
    );
    const embed = "[embed]https://imgur.com/a/abcde[/embed]";
    const article = makeArticle(embed);

    await embedsPass.run(article, ctx);

    expect(markup(article.content)).toBe(embed);
    const [issue] = ctx.tracker.getIssues("match");
    expect(issue.pass).toBe("embeds");
    expect(issue.reason).toBe("fetch-failed");
  });
});
