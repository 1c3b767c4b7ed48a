import { describe, it, expect } from "vitest";
import { contentSecurityPolicy, embedUrl, escapeHtml, renderBlankPage, renderClipPage } from "../pageTemplate";
import { makeClip } from "../../__tests__/fakes";

describe("pageTemplate", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<b>"Pog" & 'co'</b>`)).toBe("&lt;b&gt;&quot;Pog&quot; &amp; &#39;co&#39;&lt;/b&gt;");
  });

  it("builds the player embed URL", () => {
    expect(embedUrl("AbCdEf123", "test-nonce")).toBe(
      "https://clips.twitch.tv/embed?clip=AbCdEf123&nonce=test-nonce&autoplay=true&parent=localhost"
    );
  });

  it("builds the nonce policy", () => {
    expect(contentSecurityPolicy("abc")).toBe(
      "script-src 'nonce-abc' 'strict-dynamic'; object-src 'none'; base-uri 'none'; frame-ancestors 'self' https://clips.twitch.tv;"
    );
  });

  it("renders the overlay with escaped metadata", () => {
    const html = renderClipPage({
      clip: makeClip({ title: "<script>alert(1)</script>", creatorName: "a&b" }),
      gameName: "Just Chatting",
      nonce: "test-nonce",
    });

    expect(html).toContain('<div class="line1">channelX doin\' a Just Chatting stream</div>');
    expect(html).toContain('<div class="line2">&lt;script&gt;alert(1)&lt;/script&gt;</div>');
    expect(html).toContain('<div class="line3">by a&amp;b</div>');
    expect(html).toContain(
      'src="https://clips.twitch.tv/embed?clip=AbCdEf123&amp;nonce=test-nonce&amp;autoplay=true&amp;parent=localhost"'
    );
    expect(html.match(/<script/g)).toHaveLength(1);
    expect(html).toContain('<script nonce="test-nonce">');
  });

  it("renders a blank page without scripts or frames", () => {
    const html = renderBlankPage();

    expect(html).not.toContain("<script");
    expect(html).not.toContain("<iframe");
  });
});
