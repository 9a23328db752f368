import { Node, NodeAPI, NodeDef, NodeMessage, NodeMessageInFlow } from "node-red";
import ConnectionManager from './connection-manager';
import SaunaCoordinator from './coordinator';
import CommandDispatcher, { SaunaCommand } from './dispatcher';
import DeviceManager from './device-manager';
import * as CONST from './constants';
import { parseCommand } from './commands';
import { parseControllerConfig, ControllerConfig } from './config';
import { AddressResolver, discoverSauna } from './discovery';
import { SaunaValidationError } from './errors';
import { Logger, createConsoleLogger } from './logger';
import { Snapshot } from './types/sauna';
import { errorMessage } from './utils';

interface SaunaControllerNodeConfig extends NodeDef {
    host: string;
    port: string;
    unitId: string;
    pollInterval: string;
    timeout: string;
    controllerModel: string;
}

interface SaunaControllerNode extends Node {
    controllerConfig: ControllerConfig;
}

interface DiscoveryState {
    stop: boolean;
    status?: string;
}

function nodeLogger(node: Node): Logger {
    return {
        log: (msg: string) => node.log(msg),
        warn: (msg: string) => node.warn(msg),
        error: (msg: string) => node.error(msg),
        debug: (msg: string) => node.debug(msg)
    };
}

function statusText(snapshot: Snapshot): string {
    return `${snapshot.controllerStatus} ${snapshot.actualTemp}°C`;
}

function parseCandidates(value: unknown): string[] | undefined {
    if (typeof value !== 'string' || value.trim() === '') return undefined;
    return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export = function (RED: NodeAPI) {
    const log = createConsoleLogger();
    const connManager = new ConnectionManager({ logger: log });
    const deviceManager = new DeviceManager(RED.settings.userDir || __dirname, log);

    // --- Admin API ---
    RED.httpAdmin.get('/sauna-modbus/devices', RED.auth.needsPermission('sauna-modbus.read'), function (req, res) {
        res.json(deviceManager.list());
    });

    RED.httpAdmin.post('/sauna-modbus/devices', RED.auth.needsPermission('sauna-modbus.write'), function (req, res) {
        try {
            const dev = deviceManager.add(req.body);
            res.json(dev);
        } catch (e) { res.status(400).send(errorMessage(e)); }
    });

    RED.httpAdmin.put('/sauna-modbus/devices/:id', RED.auth.needsPermission('sauna-modbus.write'), function (req, res) {
        try {
            const dev = deviceManager.update(req.params.id, req.body);
            res.json(dev);
        } catch (e) { res.status(400).send(errorMessage(e)); }
    });

    RED.httpAdmin.delete('/sauna-modbus/devices/:id', RED.auth.needsPermission('sauna-modbus.write'), function (req, res) {
        const success = deviceManager.delete(req.params.id);
        if (success) res.sendStatus(200);
        else res.sendStatus(404);
    });

    const activeDiscovery: DiscoveryState = { stop: false };

    RED.httpAdmin.post('/sauna-modbus/discover/stop', RED.auth.needsPermission('sauna-modbus.read'), function (req, res) {
        activeDiscovery.stop = true;
        res.status(200).send("Stopping");
    });

    RED.httpAdmin.get('/sauna-modbus/discover/status', RED.auth.needsPermission('sauna-modbus.read'), function (req, res) {
        res.json(activeDiscovery);
    });

    RED.httpAdmin.post('/sauna-modbus/discover', RED.auth.needsPermission('sauna-modbus.write'), function (req, res) {
        const body: unknown = req.body;
        const candidates = parseCandidates(body && typeof body === 'object' ? Reflect.get(body, 'candidates') : undefined);
        activeDiscovery.stop = false;

        discoverSauna({
            resolver: new AddressResolver({ logger: log }),
            transport: connManager,
            candidates,
            shouldStop: () => activeDiscovery.stop,
            statusCallback: (msg: string) => { activeDiscovery.status = msg; },
            logger: log
        }).then(found => {
            activeDiscovery.status = found ? `Found ${found.host}` : "No sauna found";
            if (found) {
                deviceManager.upsert({ host: found.host, port: CONST.DEFAULT_MODBUS_PORT });
            }
            res.json(found);
        }, e => {
            log.error(`Discovery failed: ${errorMessage(e)}`);
            res.status(500).send(errorMessage(e));
        });
    });

    function SaunaControllerNode(this: SaunaControllerNode, config: SaunaControllerNodeConfig) {
        RED.nodes.createNode(this, config);
        const node = this;

        const { config: settings, warnings } = parseControllerConfig(config);
        node.controllerConfig = settings;
        warnings.forEach(w => node.warn(w));

        const logger = nodeLogger(node);
        const resolver = new AddressResolver({ logger });
        const coordinator = new SaunaCoordinator({
            host: settings.host,
            port: settings.port,
            unitId: settings.unitId,
            pollInterval: settings.pollInterval,
            controllerModel: settings.controllerModel,
            timeout: settings.timeout,
            transport: connManager,
            resolver,
            logger
        });
        const dispatcher = new CommandDispatcher({
            transport: connManager,
            target: () => coordinator.getTarget(),
            logger
        });

        coordinator.on('snapshot', (snapshot: Snapshot) => {
            const msg: NodeMessage = { topic: 'snapshot', payload: snapshot };
            node.send([msg, null]);
            if (snapshot.available) {
                node.status({ fill: "green", shape: "dot", text: statusText(snapshot) });
            } else {
                node.status({ fill: "red", shape: "ring", text: `unavailable (${coordinator.consecutiveFailures} failed polls)` });
            }
        });

        coordinator.on('availability', (available: boolean) => {
            if (available) node.log(`${settings.host} is reachable`);
            else node.warn(`${settings.host} is unreachable; keeping last known values`);
        });

        async function handleInput(msg: NodeMessageInFlow, send: (msg: NodeMessage | Array<NodeMessage | null>) => void) {
            if (msg.topic === 'refresh' || msg.payload === 'refresh') {
                await coordinator.refresh();
                return;
            }

            let command: SaunaCommand;
            try {
                command = parseCommand(msg.payload, coordinator.getSnapshot());
            } catch (e) {
                if (!(e instanceof SaunaValidationError)) throw e;
                const result = { success: false, action: 'unknown', kind: 'validation', reason: e.message, completedSteps: [] };
                send([null, { ...msg, topic: 'command', payload: result }]);
                return;
            }

            node.status({ fill: "blue", shape: "dot", text: `sending ${command.action}...` });
            const result = await dispatcher.dispatch(command);
            send([null, { ...msg, topic: 'command', payload: result }]);

            if (result.success) {
                await coordinator.refresh();
            } else {
                node.status({ fill: "yellow", shape: "ring", text: `${command.action} failed` });
            }
        }

        node.on('input', function (msg, send, done) {
            handleInput(msg, send).then(() => done(), (e: unknown) => {
                done(e instanceof Error ? e : new Error(errorMessage(e)));
            });
        });

        node.on('close', function (removed: boolean, done: () => void) {
            coordinator.removeAllListeners();
            coordinator.stop().then(done, (e: unknown) => {
                node.error(`Stop failed: ${errorMessage(e)}`);
                done();
            });
        });

        node.status({ fill: "grey", shape: "ring", text: `connecting to ${settings.host}...` });
        coordinator.start();
    }

    RED.nodes.registerType("sauna-controller", SaunaControllerNode);
}
