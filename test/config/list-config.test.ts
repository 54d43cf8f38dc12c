import { expect } from "chai";
import { resolve } from "path";
import { DEFAULT_CONFIG, loadConfig, loadConfigFile } from "../../src/config/list-config";

describe("list config", function () {
    it("falls back to the defaults", function () {
        expect(loadConfig({})).to.deep.equal(DEFAULT_CONFIG);
    });

    it("reads the environment", function () {
        const config = loadConfig({
            LINKED_LIST_LOG_LEVEL: "debug",
            LINKED_LIST_LOG_IDENTIFIER: "scheduler",
            LINKED_LIST_LOG_SERVICE: "1",
        });

        expect(config).to.deep.equal({
            logging: { level: "debug", identifier: "scheduler", isService: true },
        });
    });

    it("treats anything but true, 1 or yes as false", function () {
        expect(loadConfig({ LINKED_LIST_LOG_SERVICE: "TRUE" }).logging.isService).to.equal(true);
        expect(loadConfig({ LINKED_LIST_LOG_SERVICE: "no" }).logging.isService).to.equal(false);
        expect(loadConfig({ LINKED_LIST_LOG_SERVICE: "" }).logging.isService).to.equal(false);
    });

    it("rejects an unknown level", function () {
        expect(() => loadConfig({ LINKED_LIST_LOG_LEVEL: "verbose" })).to.throw(
            "LINKED_LIST_LOG_LEVEL must be one of the syslog levels, got: verbose",
        );
    });

    it("reads a dotenv file without touching process.env", function () {
        const config = loadConfigFile(resolve(__dirname, "../fixtures/service.env"));

        expect(config).to.deep.equal({
            logging: { level: "notice", identifier: "queue-worker", isService: true },
        });
        expect(process.env.LINKED_LIST_LOG_IDENTIFIER).to.equal(undefined);
    });
});
