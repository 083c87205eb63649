import { describe, expect, it } from "vitest";

import { notificationColor, notificationIcon } from "./notifications.dto";

describe("notification presentation", () => {
	it("maps icons by type with an info fallback", () => {
		expect(notificationIcon("appointment")).toBe("bx-calendar");
		expect(notificationIcon("reminder")).toBe("bx-bell");
		expect(notificationIcon("feedback")).toBe("bx-message-dots");
		expect(notificationIcon("followup")).toBe("bx-info-circle");
		expect(notificationIcon("something-new")).toBe("bx-info-circle");
	});

	it("maps colors by priority with normal as fallback", () => {
		expect(notificationColor("low")).toBe("#6c757d");
		expect(notificationColor("high")).toBe("#fd7e14");
		expect(notificationColor("whatever")).toBe("#007bff");
	});
});
