import { describe, it, expect } from "vitest"
import { Catalog } from "../catalog"
import { InvalidDropinNameError } from "../errors"
import { tmpfile } from "./tmpfile"

describe("tmpfile", () => {
    it("declares the drop-in under /etc/tmpfiles.d", () => {
        const catalog = new Catalog()
        const key = tmpfile(catalog, "random_tmpfile.conf", { content: "random stuff" })

        expect(key).toBe("File[/etc/tmpfiles.d/random_tmpfile.conf]")
        expect(catalog.get(key)).toEqual({
            type: "file",
            title: "/etc/tmpfiles.d/random_tmpfile.conf",
            ensure: "file",
            content: "random stuff",
            mode: "0444",
        })
    })

    it("accepts numerically prefixed names", () => {
        const catalog = new Catalog()

        expect(tmpfile(catalog, "10-cleanup.conf", { content: "d /run/app 0755 root root -" }))
            .toBe("File[/etc/tmpfiles.d/10-cleanup.conf]")
    })

    it("rejects a title that is not a drop-in name", () => {
        const catalog = new Catalog()

        expect(() => tmpfile(catalog, "test.badtype", { content: "random stuff" })).toThrow(InvalidDropinNameError)
        expect(() => tmpfile(catalog, "test.badtype", { content: "random stuff" }))
            .toThrow("Tmpfile[test.badtype]: title expects a match for a drop-in name (NAME.conf), got 'test.badtype'")
        expect(catalog.size).toBe(0)
    })

    it("uses an explicit filename instead of the title", () => {
        const catalog = new Catalog()
        const key = tmpfile(catalog, "test.badtype", { filename: "goodname.conf", content: "random stuff" })

        expect(key).toBe("File[/etc/tmpfiles.d/goodname.conf]")
        const resource = catalog.get(key)
        expect(resource?.type === "file" && resource.content).toBe("random stuff")
        expect(resource?.type === "file" && resource.mode).toBe("0444")
    })

    it("still validates an explicit filename", () => {
        expect(() => tmpfile(new Catalog(), "anything.conf", { filename: "bad.txt" }))
            .toThrow("Tmpfile[anything.conf]: filename expects a match for a drop-in name (NAME.conf), got 'bad.txt'")
    })

    it("removes the drop-in when absent", () => {
        const catalog = new Catalog()
        const key = tmpfile(catalog, "old.conf", { ensure: "absent" })

        const resource = catalog.get(key)
        expect(resource?.type === "file" && resource.ensure).toBe("absent")
    })

    it("treats present as a plain file with empty default content", () => {
        const catalog = new Catalog()
        const key = tmpfile(catalog, "empty.conf", { ensure: "present" })

        expect(catalog.get(key)).toEqual({
            type: "file",
            title: "/etc/tmpfiles.d/empty.conf",
            ensure: "file",
            content: "",
            mode: "0444",
        })
    })

    it("honors a custom directory", () => {
        expect(tmpfile(new Catalog(), "app.conf", { path: "/usr/lib/tmpfiles.d" }))
            .toBe("File[/usr/lib/tmpfiles.d/app.conf]")
    })
})
