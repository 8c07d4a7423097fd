/***
 *
 *
 *  Resource Catalog
 *
 *  Declarations add resources and ordering edges here. The agent later
 *  walks `applyOrder()` one resource at a time.
 *
 */

import { DependencyCycleError, DuplicateResourceError, UnknownResourceError } from "../errors"
import type { Ensure } from "../types/unit"

export type ResourceType = "unit" | "service" | "file"

// Rendered as Unit[name], Service[name], File[path]
export type ResourceRef = `${"Unit" | "Service" | "File"}[${string}]`

export interface UnitResource {
    type: "unit"
    title: string
    ensure: Ensure
    path: string
    content: string
    mode: string
    daemonReload: boolean
}

export interface ServiceResource {
    type: "service"
    title: string
    // Left undefined, the state is not managed
    ensure?: "running" | "stopped"
    enable?: boolean
}

export interface FileResource {
    type: "file"
    title: string
    ensure: "file" | "absent"
    content: string
    mode: string
}

export type Resource = UnitResource | ServiceResource | FileResource

const REF_PREFIX = {
    unit: "Unit",
    service: "Service",
    file: "File",
} as const satisfies Record<ResourceType, string>

export function ref(type: ResourceType, title: string): ResourceRef {
    return `${REF_PREFIX[type]}[${title}]`
}

export function refOf(resource: Resource): ResourceRef {
    return ref(resource.type, resource.title)
}

export class Catalog {

    private readonly entries = new Map<ResourceRef, Resource>()
    private readonly edgeList: Array<[ResourceRef, ResourceRef]> = []

    /**
     * Declares a resource. Every resource may only be declared once.
     */
    add(resource: Resource): ResourceRef {
        const key = refOf(resource)
        if (this.entries.has(key)) {
            throw new DuplicateResourceError(key)
        }
        this.entries.set(key, resource)
        return key
    }

    has(key: ResourceRef): boolean {
        return this.entries.has(key)
    }

    get(key: ResourceRef): Resource | undefined {
        return this.entries.get(key)
    }

    /**
     * `before` is applied before `after`
     */
    order(before: ResourceRef, after: ResourceRef): void {
        for (const key of [before, after]) {
            if (!this.entries.has(key)) {
                throw new UnknownResourceError(key)
            }
        }
        this.edgeList.push([before, after])
    }

    // a -> b -> c
    chain(...keys: ResourceRef[]): void {
        for (let i = 1; i < keys.length; i++) {
            this.order(keys[i - 1], keys[i])
        }
    }

    resources(): Resource[] {
        return [...this.entries.values()]
    }

    edges(): Array<[ResourceRef, ResourceRef]> {
        return this.edgeList.map(([before, after]) => [before, after])
    }

    get size(): number {
        return this.entries.size
    }

    /**
     * Topological order of every resource. Among resources whose
     * dependencies are all satisfied, the earliest declared goes first.
     */
    applyOrder(): Resource[] {
        const keys = [...this.entries.keys()]
        const position = new Map<ResourceRef, number>(keys.map((key, index) => [key, index]))
        const indegree = new Map<ResourceRef, number>(keys.map(key => [key, 0]))
        const successors = new Map<ResourceRef, ResourceRef[]>(keys.map(key => [key, []]))

        for (const [before, after] of this.edgeList) {
            successors.get(before)?.push(after)
            indegree.set(after, (indegree.get(after) ?? 0) + 1)
        }

        const byPosition = (a: ResourceRef, b: ResourceRef) => (position.get(a) ?? 0) - (position.get(b) ?? 0)
        const ready = keys.filter(key => indegree.get(key) === 0)
        const ordered: Resource[] = []

        while (ready.length > 0) {
            ready.sort(byPosition)
            const key = ready.shift()
            if (key === undefined) break

            const resource = this.entries.get(key)
            if (resource) ordered.push(resource)

            for (const next of successors.get(key) ?? []) {
                const remaining = (indegree.get(next) ?? 0) - 1
                indegree.set(next, remaining)
                if (remaining === 0) ready.push(next)
            }
        }

        if (ordered.length < keys.length) {
            throw new DependencyCycleError(this.findCycle(keys.filter(key => (indegree.get(key) ?? 0) > 0)))
        }

        return ordered
    }

    // Every unresolved resource still has an unresolved predecessor, so
    // walking predecessors from any of them must arrive back on the loop
    private findCycle(unresolved: ResourceRef[]): ResourceRef[] {
        const pending = new Set(unresolved)
        const path: ResourceRef[] = []
        let current: ResourceRef | undefined = unresolved[0]

        while (current !== undefined && !path.includes(current)) {
            path.push(current)
            const target: ResourceRef = current
            current = this.edgeList.find(([before, after]) => after === target && pending.has(before))?.[0]
        }

        if (current === undefined) {
            return unresolved
        }

        const loop = path.slice(path.indexOf(current)).reverse()
        return [...loop, loop[0]]
    }

}
